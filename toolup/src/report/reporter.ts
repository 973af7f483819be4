export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type LineSink = (stream: "stdout" | "stderr", line: string) => void;

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export const processSink: LineSink = (stream, line) => {
  process[stream].write(line + "\n");
};

/** Discards output; diagnostics are still recorded on the reporter. */
export const silentSink: LineSink = () => undefined;

/**
 * Reporter: the single channel for user-visible messages.
 *
 * `human` prints infos on stdout and warnings/errors on stderr;
 * `jsonl` prints every diagnostic as one JSON object per line on stdout.
 */
export class Reporter {
  private readonly emitted: Diagnostic[] = [];

  constructor(
    readonly format: OutputFormat = "human",
    private readonly sink: LineSink = processSink,
  ) {}

  emit(d: Diagnostic): void {
    this.emitted.push(d);
    if (this.format === "jsonl") {
      this.sink("stdout", JSON.stringify(d));
      return;
    }
    switch (d.level) {
      case "info":
        this.sink("stdout", d.message);
        break;
      case "warn":
        this.sink("stderr", `WARNING: ${d.message}`);
        break;
      case "error":
        this.sink("stderr", `error: ${d.message}`);
        break;
    }
  }

  info(code: string, message: string, extra?: Pick<Diagnostic, "path" | "details">): void {
    this.emit(diag("info", code, message, extra));
  }

  warn(code: string, message: string, extra?: Pick<Diagnostic, "path" | "details">): void {
    this.emit(diag("warn", code, message, extra));
  }

  error(code: string, message: string, extra?: Pick<Diagnostic, "path" | "details">): void {
    this.emit(diag("error", code, message, extra));
  }

  diagnostics(): Diagnostic[] {
    return [...this.emitted];
  }

  warnings(): Diagnostic[] {
    return this.emitted.filter((d) => d.level === "warn");
  }
}
