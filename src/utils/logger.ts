import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerOptions {
    verbose?: boolean;
    // append every entry to this file as well
    logFile?: string;
}

// json lines on stderr, so that stdout stays free for command output
export const createLogger = (options: LoggerOptions = {}): Logger => {
    const level: pino.Level = options.verbose ? "debug" : "info";

    const streams: pino.StreamEntry[] = [{ level, stream: pino.destination(2) }];
    if (options.logFile) {
        streams.push({
            level,
            stream: pino.destination({ dest: options.logFile, append: true, mkdir: true, sync: true })
        });
    }

    return pino(
        {
            level,
            base: undefined,
            timestamp: pino.stdTimeFunctions.isoTime,
        },
        pino.multistream(streams)
    );
};
