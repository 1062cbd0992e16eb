import { describe, it, expect } from "vitest";
import { collectTextRuns, cleanFontFamily, mapTextAlign, isBoldWeight } from "../../src/style/text-runs.js";
import { el, BOLD } from "../helpers/tree.js";

describe("text runs", () => {
  it("yields one run for plain text", () => {
    const { runs } = collectTextRuns(el("p", {}, ["Hello world"]));
    expect(runs).toEqual([
      {
        text: "Hello world",
        bold: false,
        italic: false,
        underline: false,
        align: "left",
        fontSize: 12,
        fontFace: "Arial",
        breakLine: false,
      },
    ]);
  });

  it("splits one bold word into three runs", () => {
    const { runs } = collectTextRuns(
      el("p", {}, ["Hello ", el("b", { style: BOLD }, ["bold"]), " world"])
    );
    expect(runs.map((r) => r.text)).toEqual(["Hello ", "bold", " world"]);
    expect(runs.map((r) => r.bold)).toEqual([false, true, false]);
  });

  it("applies tag emphasis when the snapshot is silent", () => {
    const { runs } = collectTextRuns(el("p", {}, ["a ", el("strong", {}, ["b"])]));
    expect(runs.map((r) => r.bold)).toEqual([false, true]);
  });

  it("lets the element's own value override the tag default", () => {
    const { runs } = collectTextRuns(
      el("p", {}, ["a ", el("b", { style: { fontWeight: "400" } }, ["b"])])
    );
    expect(runs).toHaveLength(1);
    expect(runs[0]!.text).toBe("a b");
    expect(runs[0]!.bold).toBe(false);
  });

  it("collapses whitespace and trims the paragraph", () => {
    const { runs } = collectTextRuns(el("p", {}, ["  Lots \n of   space  "]));
    expect(runs.map((r) => r.text)).toEqual(["Lots of space"]);
  });

  it("keeps non-breaking spaces while collapsing ordinary ones", () => {
    const { runs } = collectTextRuns(el("p", {}, ["a\u00a0\u00a0b   c"]));
    expect(runs.map((r) => r.text)).toEqual(["a\u00a0\u00a0b c"]);
  });

  it("truncates across runs at the text limit", () => {
    const { runs } = collectTextRuns(
      el("p", {}, ["Hello ", el("b", {}, ["world"])]),
      8
    );
    expect(runs.map((r) => r.text)).toEqual(["Hello ", "wo"]);
    expect(runs[1]!.breakLine).toBe(false);
  });

  it("counts the text limit in code points, never splitting a pair", () => {
    const { runs } = collectTextRuns(el("p", {}, ["\u{1F600}\u{1F600} done"]), 1);
    expect(runs.map((r) => r.text)).toEqual(["\u{1F600}"]);
  });

  it("inherits block font attributes into inline runs", () => {
    const { runs } = collectTextRuns(
      el(
        "p",
        {
          style: {
            fontSize: 24,
            color: "rgb(255, 0, 0)",
            fontFamily: "'Helvetica Neue', Arial, sans-serif",
          },
        },
        ["x ", el("em", {}, ["y"])]
      )
    );
    expect(runs[1]).toMatchObject({
      text: "y",
      italic: true,
      fontSize: 18,
      color: "FF0000",
      fontFace: "Helvetica Neue",
    });
  });

  it("carries underline through nested emphasis", () => {
    const { runs } = collectTextRuns(
      el("p", {}, [
        el("u", {}, ["a ", el("b", { style: { fontWeight: "700", textDecoration: "none" } }, ["b"])]),
      ])
    );
    expect(runs.map((r) => [r.text, r.underline, r.bold])).toEqual([
      ["a ", true, false],
      ["b", true, true],
    ]);
  });

  it("merges adjacent runs with identical formatting", () => {
    const { runs } = collectTextRuns(el("p", {}, ["one ", el("span", {}, ["two"])]));
    expect(runs.map((r) => r.text)).toEqual(["one two"]);
  });

  it("captures an explicit color span", () => {
    const { runs } = collectTextRuns(
      el("p", { style: { color: "rgb(0, 0, 0)" } }, [
        "status: ",
        el("span", { style: { color: "rgb(22, 163, 74)" } }, ["ok"]),
      ])
    );
    expect(runs.map((r) => r.color)).toEqual(["000000", "16A34A"]);
  });

  it("turns list items into bulleted lines", () => {
    const { runs } = collectTextRuns(
      el("ul", {}, ["\n  ", el("li", {}, ["First"]), "\n  ", el("li", {}, ["Second"]), "\n"])
    );
    expect(runs.map((r) => [r.text, r.bullet, r.breakLine])).toEqual([
      ["First", { type: "bullet", indent: 0 }, true],
      ["Second", { type: "bullet", indent: 0 }, false],
    ]);
  });

  it("numbers ordered list items and indents nested lists", () => {
    const { runs } = collectTextRuns(
      el("ol", {}, [el("li", {}, ["Parent", el("ol", {}, [el("li", {}, ["Child"])])])])
    );
    expect(runs.map((r) => [r.text, r.bullet])).toEqual([
      ["Parent", { type: "number", indent: 0 }],
      ["Child", { type: "number", indent: 1 }],
    ]);
  });

  it("breaks lines at <br>", () => {
    const { runs } = collectTextRuns(el("p", {}, ["Line one", el("br"), "Line two"]));
    expect(runs.map((r) => [r.text, r.breakLine])).toEqual([
      ["Line one", true],
      ["Line two", false],
    ]);
  });

  it("takes alignment from the block", () => {
    const { runs } = collectTextRuns(el("h1", { style: { textAlign: "center" } }, ["Title"]));
    expect(runs[0]!.align).toBe("center");
  });

  it("cuts text at the configured limit", () => {
    const { runs } = collectTextRuns(
      el("p", {}, ["Hello ", el("b", { style: BOLD }, ["bold"]), " world"]),
      8
    );
    expect(runs.map((r) => [r.text, r.breakLine])).toEqual([
      ["Hello ", false],
      ["bo", false],
    ]);
  });

  it("flags a typed bullet symbol", () => {
    expect(collectTextRuns(el("p", {}, ["• item"])).manualBullet).toBe(true);
    expect(collectTextRuns(el("p", {}, ["item •"])).manualBullet).toBe(false);
  });

  it("yields no runs for an empty block", () => {
    expect(collectTextRuns(el("p", {}, ["   "])).runs).toEqual([]);
  });
});

describe("text helpers", () => {
  it("cleans font-family lists", () => {
    expect(cleanFontFamily('"Segoe UI", sans-serif')).toBe("Segoe UI");
    expect(cleanFontFamily(undefined)).toBe("Arial");
  });

  it("maps text-align values", () => {
    expect(mapTextAlign("justify")).toBe("justify");
    expect(mapTextAlign("end")).toBe("right");
    expect(mapTextAlign("start")).toBe("left");
  });

  it("reads bold weights", () => {
    expect(isBoldWeight("700")).toBe(true);
    expect(isBoldWeight(600)).toBe(true);
    expect(isBoldWeight("bold")).toBe(true);
    expect(isBoldWeight("400")).toBe(false);
    expect(isBoldWeight("normal")).toBe(false);
  });
});
