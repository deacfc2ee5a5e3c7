/**
 * What the orchestrator hands to an image builder for one unit
 */
export interface BuildRequest {
    unit: string;
    /** Effective Dockerfile of the unit, inherited steps included */
    dockerfile: string;
    /** Build directories to merge into the context, later ones taking precedence */
    contextDirectories: string[];
    /** Reference to tag the result with, `repository/unit:tag` */
    image: string;
    noCache: boolean;
}

export interface ImageHandle {
    /** Image ID reported by the engine */
    id: string;
    image: string;
}

/**
 * Turns a composed Dockerfile and its context into an image. Implementations
 * should stop work when `signal` aborts; the executor treats the unit as
 * failed either way.
 */
export interface ImageBuilder {
    build(request: BuildRequest, signal: AbortSignal): Promise<ImageHandle>;
}

export function imageName(
    unit: string,
    options: { repository?: string; tag: string },
): string {
    const repository = options.repository?.replace(/\/+$/, '');
    const name = repository ? `${repository}/${unit}` : unit;
    return `${name}:${options.tag}`;
}
