import * as fs from "fs";
import * as path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  NO_RESULTS,
  buildExport,
  compareStatusKeys,
  printSummary,
  saveJsonSummary,
  statusTable,
  summaryLines,
} from "../src/monitor/summary";
import { buildFinalResult } from "../src/stats/overall";
import { LATENCY_HEADING, THROUGHPUT_HEADING } from "../src/stats/region-format";
import { envelope, region, tempDir } from "./helpers";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("compareStatusKeys", () => {
  it("sorts numeric codes numerically and puts other keys last", () => {
    expect(["404", "abc", "1000", "200", "-1"].sort(compareStatusKeys)).toEqual(["-1", "200", "404", "1000", "abc"]);
  });
});

describe("statusTable", () => {
  it("lists every status of the overall total", () => {
    const lines = statusTable(region("overall", { statuses: { "500": 5, "200": 95 } })).split("\n");

    expect(lines[1]).toBe("║ HTTPStatus │ Requests ║");
    const rows = lines.filter((line) => line.startsWith("║ ") && !line.includes("HTTPStatus"));
    expect(rows).toEqual(["║ 200        │ 95       ║", "║ 500        │ 5        ║"]);
  });
});

describe("summaryLines", () => {
  it("reports when nothing arrived", () => {
    expect(summaryLines(buildFinalResult(null))).toEqual([NO_RESULTS]);
  });

  it("prints each region, then the overall totals and the status table", () => {
    const result = buildFinalResult(envelope([region("us-east-1"), region("ap-south-1")]));

    const throughput = "       100    2.05 MB     0.125s      40.50     812.25";
    const latency = "    1.500s     0.020s          2          5";
    expect(summaryLines(result)).toEqual([
      "Regional results",
      "",
      "Region: ap-south-1",
      THROUGHPUT_HEADING,
      throughput,
      LATENCY_HEADING,
      latency,
      "Region: us-east-1",
      THROUGHPUT_HEADING,
      throughput,
      LATENCY_HEADING,
      latency,
      "",
      "Overall",
      "",
      THROUGHPUT_HEADING,
      "       200     4.1 MB     0.250s      81.00    1624.50",
      LATENCY_HEADING,
      "    3.000s     0.040s          4         10",
      "",
      statusTable(result.overall ?? region("unused")).trimEnd(),
      "",
    ]);
  });

  it("appends a warning for inconsistent regions", () => {
    const result = buildFinalResult(envelope([region("eu-west-1", { totalRequests: 10, statuses: { "200": 12 } })]));

    const lines = summaryLines(result);

    expect(lines[lines.length - 2]).toBe(
      "⚠️  Region eu-west-1: status counts below 400 exceed total requests by 2 (inconsistent snapshot)",
    );
    expect(lines[6]).toBe("    1.500s     0.020s          2    invalid");
  });

  it("writes every line to the console", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    printSummary(buildFinalResult(null));

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(NO_RESULTS);
  });
});

describe("JSON export", () => {
  it("keys every region by id and adds the overall total", () => {
    const document = buildExport(buildFinalResult(envelope([region("us-east-1")])));

    expect(Object.keys(document ?? {})).toEqual(["us-east-1", "overall"]);
    expect(document?.overall).toEqual({
      region: "overall",
      "total-reqs": 100,
      "tot-bytes-read": 2_048_000,
      "ave-time-for-req": 125_000_000,
      "ave-req-per-sec": 40.5,
      "ave-kbytes-per-sec": 812.25,
      slowest: 1_500_000_000,
      fastest: 20_000_000,
      "tot-timed-out": 2,
      statuses: { "200": 95, "500": 5 },
    });
  });

  it("has nothing to export without results", () => {
    expect(buildExport(buildFinalResult(null))).toBeNull();
  });

  it("writes pretty-printed JSON to the output path", () => {
    const file = path.join(tempDir(), "results.json");

    expect(saveJsonSummary(file, buildFinalResult(envelope([region("us-east-1")])))).toBe(true);

    const text = fs.readFileSync(file, "utf-8");
    expect(text.endsWith("}\n")).toBe(true);
    const parsed: unknown = JSON.parse(text);
    expect(parsed).toMatchObject({ "us-east-1": { "total-reqs": 100 }, overall: { region: "overall", "total-reqs": 100 } });
  });

  it("skips the file when nothing was received", () => {
    const file = path.join(tempDir(), "results.json");

    expect(saveJsonSummary(file, buildFinalResult(null))).toBe(false);
    expect(fs.existsSync(file)).toBe(false);
  });

  it("reports write failures without throwing", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const file = path.join(tempDir(), "missing", "results.json");

    expect(saveJsonSummary(file, buildFinalResult(envelope([region("us-east-1")])))).toBe(false);

    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toContain("ENOENT");
  });
});
