/**
 * Release version of the registry; also the fingerprint cache files are tagged with
 */
export const VERSION = "1.0.0";
