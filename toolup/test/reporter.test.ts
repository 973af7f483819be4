import { describe, expect, it } from "vitest";
import { Reporter, type LineSink } from "../src/report/reporter.js";

function capture(): { sink: LineSink; lines: string[] } {
  const lines: string[] = [];
  return { sink: (stream, line) => lines.push(`${stream}: ${line}`), lines };
}

describe("Reporter", () => {
  it("prints human output by level", () => {
    const { sink, lines } = capture();
    const reporter = new Reporter("human", sink);
    reporter.info("INSTALL_DONE", "Installed Channel 1.0.0");
    reporter.warn("INIT_FAILED", "initialization of fmt exited with status 3");
    reporter.error("NOT_INSTALLED", "nothing here");
    expect(lines).toEqual([
      "stdout: Installed Channel 1.0.0",
      "stderr: WARNING: initialization of fmt exited with status 3",
      "stderr: error: nothing here",
    ]);
  });

  it("prints one JSON object per diagnostic in jsonl", () => {
    const { sink, lines } = capture();
    const reporter = new Reporter("jsonl", sink);
    reporter.info("INSTALL_START", "Installing", { path: "/tc/1.0.0" });
    expect(lines).toEqual([
      'stdout: {"level":"info","code":"INSTALL_START","message":"Installing","path":"/tc/1.0.0"}',
    ]);
  });

  it("records every diagnostic", () => {
    const reporter = new Reporter("human", () => undefined);
    reporter.info("A", "a");
    reporter.warn("B", "b");
    expect(reporter.diagnostics().map((d) => d.code)).toEqual(["A", "B"]);
    expect(reporter.warnings()).toEqual([{ level: "warn", code: "B", message: "b" }]);
  });
});
