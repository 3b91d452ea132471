import { LOG_LEVELS, LogFields, LogLevel } from "./types";

export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerContext {
  component: string;
  runId: string;
  level?: LogLevel;
  /** Fields repeated on every record this logger writes. */
  bindings?: LogFields;
  write?: LogWriter;
}

const consoleWriter: LogWriter = (level, line) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

export class Logger {
  private readonly context: LoggerContext;
  private readonly threshold: number;
  private readonly writeLine: LogWriter;

  constructor(context: LoggerContext) {
    this.context = context;
    this.threshold = LOG_LEVELS.indexOf(context.level ?? "info");
    this.writeLine = context.write ?? consoleWriter;
  }

  /** Same run, level and writer; bindings accumulate. */
  child(component: string, bindings?: LogFields): Logger {
    return new Logger({
      ...this.context,
      component,
      bindings: { ...this.context.bindings, ...bindings },
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...this.context.bindings,
      ...fields,
    };
    this.writeLine(level, JSON.stringify(payload));
  }
}
