import pino from "pino";

const pretty = process.env.LOG_PRETTY === "1";

type LoggerContext = {
  envName: string;
  walletLabel: string;
};

let loggerContext: LoggerContext | null = null;

export function setLoggerContext(context: LoggerContext): void {
  loggerContext = context;
}

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  transport: pretty
    ? { target: "pino-pretty", options: { colorize: true, translateTime: "SYS:standard" } }
    : undefined,
  mixin() {
    return loggerContext ? { env: loggerContext.envName, wallet: loggerContext.walletLabel } : {};
  },
});
