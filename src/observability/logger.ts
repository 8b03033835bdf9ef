import debug from "debug";

export type Logger = debug.Debugger;

export const createLogger = (scope: string): Logger => debug(`airq:${scope}`);
