export interface EngineLogger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
}
