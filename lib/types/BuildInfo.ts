/**
 * One message of the engine's newline-delimited JSON build progress stream
 */
export interface BuildInfo {
    id?: string;
    stream?: string;
    status?: string;
    progress?: string;
    error?: string;
    errorDetail?: {
        code?: number;
        message?: string;
    };
    aux?: {
        ID?: string;
    };
}
