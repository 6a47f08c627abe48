/**
 * Tagged log target handed to library code. Each app passes its own logger.
 */
export interface LogSink {
    debug(tag: string, message: string): void;
    info(tag: string, message: string): void;
    warn(tag: string, message: string): void;
    error(tag: string, message: string): void;
}
