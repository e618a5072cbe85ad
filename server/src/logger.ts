import pino from "pino";
import type { FastifyBaseLogger } from "fastify";
import type { Config } from "./config.js";

export type Logger = FastifyBaseLogger;

export const createLogger = (config: Pick<Config, "LOG_LEVEL">): Logger =>
  pino({
    level: config.LOG_LEVEL,
    base: { service: "hooktrap" },
  });

/** A logger that drops everything; handy when wiring components by hand. */
export const silentLogger = (): Logger => pino({ level: "silent" });
