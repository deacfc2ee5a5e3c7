/**
 * A named build recipe. Recipe text is opaque to the orchestrator.
 */
export interface ImageUnit {
    name: string;
    /** Explicit base image, the manifest's `FROM` */
    baseReference?: string;
    /** Units this one builds on, in application order */
    requires: string[];
    /** Directory whose files form this unit's build context */
    buildDirectory?: string;
    buildSteps: string;
    description?: string;
}
