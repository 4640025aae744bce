import { describe, expect, it } from "vitest";

import { diff } from "../src/diff/diff.js";
import { parseDocumentText } from "../src/load/loadDocument.js";
import { formatChangeLine, formatTextReport } from "../src/reporting/formatText.js";
import type { DiffReport } from "../src/reporting/types.js";
import { fromPlain } from "../src/value/fromPlain.js";

function plainReport(left: unknown, right: unknown): DiffReport {
  return {
    left: { label: "a.yaml" },
    right: { label: "b.yaml" },
    changes: diff(fromPlain(left), fromPlain(right))
  };
}

describe("formatTextReport", () => {
  it("prints one line per change and a summary", () => {
    const report = plainReport(
      { name: "svc", port: 8080, tags: ["a", "b"] },
      { name: "svc", port: 9090, tags: ["a", "b", "c"] }
    );

    expect(formatTextReport(report)).toBe(
      ["port: changed 8080 -> 9090", 'tags[2]: added "c"', "2 difference(s) found."].join("\n")
    );
  });

  it("describes removals and type changes", () => {
    const report = plainReport({ a: "1", b: 2, c: { d: [1] } }, { a: 1, c: null });

    expect(formatTextReport(report)).toBe(
      [
        'a: type changed string "1" -> number 1',
        "b: removed 2",
        "c: type changed mapping {d: [1]} -> null null",
        "3 difference(s) found."
      ].join("\n")
    );
  });

  it("reports identical documents", () => {
    expect(formatTextReport(plainReport({ a: 1, b: 2 }, { b: 2, a: 1 }))).toBe("No differences found.");
  });

  it("truncates long values", () => {
    const report = plainReport({ msg: "short" }, { msg: "a much longer message" });
    expect(formatTextReport(report, { maxValueWidth: 10 })).toBe(
      ['msg: changed "short" -> "a much...', "1 difference(s) found."].join("\n")
    );
  });

  it("appends source locations when asked", () => {
    const leftText = "name: svc\nport: 8080\ntags:\n  - a\n  - b\n";
    const rightText = "name: svc\nport: 9090\ntags:\n  - a\n  - b\n  - c\n";
    const report: DiffReport = {
      left: { label: "left.yaml" },
      right: { label: "right.yaml" },
      changes: diff(parseDocumentText(leftText, "left.yaml"), parseDocumentText(rightText, "right.yaml"))
    };

    expect(formatTextReport(report, { locations: true })).toBe(
      ["port: changed 8080 -> 9090 (L2:7 R2:7)", 'tags[2]: added "c" (R6:5)', "2 difference(s) found."].join("\n")
    );
  });

  it("omits the location suffix for values without locations", () => {
    const report = plainReport({ a: 1 }, { a: 2 });
    expect(formatTextReport(report, { locations: true })).toBe(
      ["a: changed 1 -> 2", "1 difference(s) found."].join("\n")
    );
  });

  it("shows source context for located changes", () => {
    const leftText = "name: svc\nport: 8080\ntags:\n  - a\n  - b\n";
    const rightText = "name: svc\nport: 9090\ntags:\n  - a\n  - b\n  - c\n";

    const report: DiffReport = {
      left: { label: "left.yaml", text: leftText },
      right: { label: "right.yaml", text: rightText },
      changes: diff(parseDocumentText(leftText, "left.yaml"), parseDocumentText(rightText, "right.yaml"))
    };

    expect(formatTextReport(report, { context: 1 })).toBe(
      [
        "port: changed 8080 -> 9090",
        "  left.yaml:2:7",
        "      1 | name: svc",
        "    > 2 | port: 8080",
        "      3 | tags:",
        "  right.yaml:2:7",
        "      1 | name: svc",
        "    > 2 | port: 9090",
        "      3 | tags:",
        'tags[2]: added "c"',
        "  right.yaml:6:5",
        "      5 |   - b",
        "    > 6 |   - c",
        "2 difference(s) found."
      ].join("\n")
    );
  });

  it("skips context when the source text is unknown", () => {
    const report: DiffReport = {
      left: { label: "left.yaml" },
      right: { label: "right.yaml" },
      changes: diff(parseDocumentText("a: 1\n", "l"), parseDocumentText("a: 2\n", "r"))
    };

    expect(formatTextReport(report, { context: 2 })).toBe(["a: changed 1 -> 2", "1 difference(s) found."].join("\n"));
  });
});

describe("formatChangeLine", () => {
  it("renders the root path", () => {
    const [change] = diff(fromPlain([1]), fromPlain({ a: 1 }));
    expect(change && formatChangeLine(change)).toBe("(root): type changed sequence [1] -> mapping {a: 1}");
  });
});
