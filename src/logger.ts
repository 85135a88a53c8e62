// Process-wide pino logger. Sinks are attached by the CLI once flags are known:
// the console sink honours the colour switch and the file sink keeps a copy of
// the run. Library consumers and tests get a silent logger until they attach
// something themselves.
import pino from "pino";
import pretty from "pino-pretty";

type FileDestination = ReturnType<typeof pino.destination>;

const streams = pino.multistream([]);

export const logger = pino(
  {
    name: "bootstrap-salt",
    level: process.env.BS_LOG_LEVEL ?? "info",
  },
  streams,
);

let fileDestination: FileDestination | null = null;

export function attachConsole(options: { color: boolean }): void {
  streams.add({
    level: "trace",
    stream: pretty({
      colorize: options.color,
      destination: 2,
      sync: true,
      ignore: "pid,hostname,name",
      translateTime: "SYS:HH:MM:ss",
    }),
  });
}

export function attachLogFile(path: string): void {
  if (fileDestination) return;
  fileDestination = pino.destination({ dest: path, sync: true, mkdir: true });
  streams.add({ level: "trace", stream: fileDestination });
}

/** Flush and close the log file sink. Safe to call more than once. */
export function closeLogFile(): void {
  if (!fileDestination) return;
  const dest = fileDestination;
  fileDestination = null;
  dest.flushSync();
  dest.end();
}

export function setLogLevel(level: pino.Level): void {
  logger.level = level;
}
