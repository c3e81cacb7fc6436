import pino from "pino";
import { validateEnv } from "@shared/env";

const env = validateEnv(process.env);

// Every line carries the service name so render logs can be picked out of a
// shared collector; pid and hostname are left to the runtime's own labels.
export const logger = pino({
  name: "candlecast",
  level: env.LOG_LEVEL,
  base: { service: "chart-render", env: env.NODE_ENV },
  ...(env.NODE_ENV === "development"
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "service,env",
          },
        },
      }
    : {}),
});
