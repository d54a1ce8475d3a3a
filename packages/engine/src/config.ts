import bunyan from "bunyan";

const LOG_LEVELS: ReadonlyArray<bunyan.LogLevelString> = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

function logLevel(value: string | undefined): bunyan.LogLevelString {
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

export default {
  logName: process.env.LOG_NAME || "multiverse-chess-engine",
  logLevel: logLevel(process.env.LOG_LEVEL),
};
