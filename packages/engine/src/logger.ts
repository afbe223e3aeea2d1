import bunyan from "bunyan";

const LEVELS: readonly bunyan.LogLevelString[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export function resolveLevel(value: string | undefined): bunyan.LogLevelString {
  return LEVELS.find((level) => level === value) ?? "info";
}

const log = bunyan.createLogger({
  name: "enclosure",
  level: resolveLevel(process.env.LOG_LEVEL),
});

export default log;
