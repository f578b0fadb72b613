import pino from "pino";
import { getLogLevel } from "@/config";

const isDev = process.stdout.isTTY;

export const log = pino({
  level: getLogLevel(),
  ...(isDev && {
    transport: {
      target: "pino-pretty",
      options: { colorize: true },
    },
  }),
});
