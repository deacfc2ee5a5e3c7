/**
 * Last successful build of a unit
 */
export interface BuildRecord {
    fingerprint: string;
    /** ISO 8601 timestamp */
    builtAt: string;
    /** Image ID returned by the builder */
    image?: string;
}
