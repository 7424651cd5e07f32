/**
 * Launcher version, printed by `--version`.
 */
export const VERSION = '1.0.0';
