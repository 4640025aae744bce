import { describe, expect, it } from "vitest";

import { formatPath } from "../src/diff/path.js";

describe("formatPath", () => {
  it("renders the root", () => {
    expect(formatPath([])).toBe("(root)");
  });

  it("joins keys with dots and indices with brackets", () => {
    expect(formatPath(["a", "b", 2, "c"])).toBe("a.b[2].c");
    expect(formatPath([0, "name"])).toBe("[0].name");
    expect(formatPath(["matrix", 1, 0])).toBe("matrix[1][0]");
  });

  it("keeps hyphens and underscores bare", () => {
    expect(formatPath(["my-key", "_private"])).toBe("my-key._private");
  });

  it("quotes keys that are not identifiers", () => {
    expect(formatPath(["metadata", "labels", "app.kubernetes.io/name"])).toBe(
      "metadata.labels['app.kubernetes.io/name']"
    );
    expect(formatPath(["1abc"])).toBe("['1abc']");
    expect(formatPath([""])).toBe("['']");
    expect(formatPath(["a b", "c"])).toBe("['a b'].c");
  });

  it("escapes quotes and backslashes inside quoted keys", () => {
    expect(formatPath(["it's"])).toBe("['it\\'s']");
    expect(formatPath(["C:\\dir"])).toBe("['C:\\\\dir']");
  });
});
