import bunyan from "bunyan";

const LEVELS: readonly bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function resolveLevel(raw: string | undefined): bunyan.LogLevelString {
  return LEVELS.find((level) => level === raw?.toLowerCase()) ?? "info";
}

const log = bunyan.createLogger({
  name: "cipherquote-engine",
  level: resolveLevel(process.env.LOG_LEVEL),
  serializers: bunyan.stdSerializers,
});

export type Logger = bunyan;

export default log;
