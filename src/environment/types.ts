/**
 * A single environment variable as seen by a script.
 */
export type EnvironmentEntry = readonly [name: string, value: string];

/**
 * Environment captured for one script invocation, ordered by name.
 * Each invocation gets its own snapshot.
 */
export type EnvironmentSnapshot = readonly EnvironmentEntry[];

/**
 * Where a snapshot is captured from. Shaped like process.env so the real
 * environment and a test fixture can be passed the same way.
 */
export type EnvironmentSource = Readonly<Record<string, string | undefined>>;
