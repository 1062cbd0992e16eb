import { describe, it, expect, vi } from "vitest";
import { ZodError } from "zod";
import { convertDocument, unwrapConversion } from "../src/convert.js";
import { ConversionFailedError } from "../src/errors.js";
import type { ConversionResult, ConversionSuccess } from "../src/schema/result.js";
import type { BorderSide } from "../src/schema/source.js";
import { BOLD, doc, el } from "./helpers/tree.js";

const SOLID: BorderSide = { width: 1, style: "solid", color: "rgb(0, 0, 0)" };
const NO_BORDER: BorderSide = { width: 0, style: "none", color: "rgb(0, 0, 0)" };

function success(result: ConversionResult): ConversionSuccess {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.issues.map((i) => i.kind).join(", ")}`);
  }
  return result;
}

function issueKinds(result: ConversionResult): string[] {
  if (result.ok) throw new Error("expected failure");
  return result.issues.map((i) => i.kind);
}

describe("convertDocument", () => {
  it("splits a bordered box holding a paragraph into a shape then a text primitive", () => {
    const result = success(
      convertDocument(
        doc([
          el(
            "div",
            {
              box: { x: 1, y: 1, w: 4, h: 2 },
              style: { borderTop: SOLID, borderRight: NO_BORDER, borderBottom: NO_BORDER, borderLeft: NO_BORDER },
            },
            [el("p", { box: { x: 1.25, y: 1.25, w: 3, h: 0.5 } }, ["Hello"])]
          ),
        ])
      )
    );

    expect(result.primitives.map((p) => [p.kind, p.z])).toEqual([
      ["shape", 0],
      ["text", 1],
    ]);
    const [shape, text] = result.primitives;
    expect(shape).toMatchObject({
      kind: "shape",
      id: "body/div[0]",
      box: { x: 1, y: 1, w: 4, h: 2 },
      outline: {
        color: "000000",
        width: 0.75,
        sides: { top: true, right: false, bottom: false, left: false },
      },
    });
    expect(text).toEqual({
      kind: "text",
      id: "body/div[0]/p[0]",
      box: { x: 1.25, y: 1.25, w: 3, h: 0.5 },
      z: 1,
      runs: [
        {
          text: "Hello",
          bold: false,
          italic: false,
          underline: false,
          align: "left",
          fontSize: 12,
          fontFace: "Arial",
          breakLine: false,
        },
      ],
    });
  });

  it("resolves a percentage corner radius against the shorter side", () => {
    const result = success(
      convertDocument(doc([el("div", { box: { x: 1, y: 1, w: 1, h: 2 }, style: { borderRadius: "25%" } })]))
    );
    expect(result.primitives[0]).toMatchObject({ kind: "shape", cornerRadius: 0.25 });
  });

  it("keeps every primitive inside the canvas on success", () => {
    const result = success(
      convertDocument(
        doc([
          el("div", { box: { x: 0, y: 0, w: 10, h: 5.625 }, style: { backgroundColor: "rgb(255, 255, 255)" } }),
          el("h1", { box: { x: 0.5, y: 0.5, w: 9, h: 1 } }, ["Quarterly review"]),
        ])
      )
    );
    for (const { box } of result.primitives) {
      expect(box.x).toBeGreaterThanOrEqual(0);
      expect(box.y).toBeGreaterThanOrEqual(0);
      expect(box.x + box.w).toBeLessThanOrEqual(10.01);
      expect(box.y + box.h).toBeLessThanOrEqual(5.635);
    }
  });

  it("trims a box within the overflow tolerance onto the canvas", () => {
    const result = success(
      convertDocument(
        doc([el("div", { box: { x: 0, y: 0, w: 10.005, h: 1 }, style: { backgroundColor: "rgb(255, 0, 0)" } })])
      )
    );
    expect(result.primitives[0]?.box).toEqual({ x: 0, y: 0, w: 10, h: 1 });
  });

  it("emits a bitmap background as an image", () => {
    const result = success(
      convertDocument(
        doc([el("div", { box: { x: 1, y: 1, w: 4, h: 2 }, style: { backgroundImage: 'url("photo.png")' } })])
      )
    );
    expect(result.primitives).toEqual([
      {
        kind: "image",
        id: "body/div[0]#background",
        box: { x: 1, y: 1, w: 4, h: 2 },
        z: 0,
        src: "photo.png",
      },
    ]);
  });

  it("paints the fill of a bitmap-backed container below its picture", () => {
    const result = success(
      convertDocument(
        doc([
          el(
            "div",
            {
              box: { x: 1, y: 1, w: 4, h: 2 },
              style: { backgroundColor: "rgb(0, 0, 0)", backgroundImage: 'url("photo.png")' },
            },
            [el("p", { box: { x: 1.5, y: 1.5, w: 3, h: 0.5 } }, ["Caption"])]
          ),
        ])
      )
    );
    expect(result.primitives.map((p) => [p.kind, p.id, p.z])).toEqual([
      ["shape", "body/div[0]", 0],
      ["image", "body/div[0]#background", 1],
      ["text", "body/div[0]/p[0]", 2],
    ]);
    expect(result.primitives[0]).toMatchObject({ fill: { color: "000000", transparency: 0 } });
  });

  it("emits one run for plain text and three for one bold span", () => {
    const plain = success(convertDocument(doc([el("p", {}, ["Hello world"])])));
    expect(plain.primitives[0]).toMatchObject({ kind: "text", runs: [{ text: "Hello world" }] });

    const mixed = success(
      convertDocument(doc([el("p", {}, ["Hello ", el("span", { style: BOLD }, ["world"]), " again"])]))
    );
    const text = mixed.primitives[0];
    if (text?.kind !== "text") throw new Error("expected a text primitive");
    expect(text.runs.map((r) => [r.text, r.bold])).toEqual([
      ["Hello ", false],
      ["world", true],
      [" again", false],
    ]);
  });

  it("reports one overflow with the exact overage", () => {
    const result = convertDocument(
      doc([el("div", { box: { x: 5, y: 1, w: 15, h: 1 }, style: { backgroundColor: "rgb(0, 0, 255)" } })])
    );
    if (result.ok) throw new Error("expected failure");
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({
      kind: "Overflow",
      edge: "right",
      amount: 10,
      nodes: [{ path: "body/div[0]", tag: "div" }],
    });
  });

  it("reports a duplicate placeholder id once and emits no primitives", () => {
    const result = convertDocument(
      doc([
        el("div", { id: "chart-1", classes: ["placeholder"], box: { x: 1, y: 1, w: 3, h: 2 } }),
        el("div", { id: "chart-1", classes: ["placeholder"], box: { x: 5, y: 1, w: 3, h: 2 } }),
      ])
    );
    if (result.ok) throw new Error("expected failure");
    expect("primitives" in result).toBe(false);
    expect(result.issues).toEqual([
      {
        kind: "DuplicatePlaceholderId",
        nodes: [
          { path: "body/div[0]", tag: "div", id: "chart-1" },
          { path: "body/div[1]", tag: "div", id: "chart-1" },
        ],
        detail: 'placeholder id "chart-1" is used by 2 elements',
        placeholderId: "chart-1",
      },
    ]);
  });

  it("reports a gradient without flattening it", () => {
    const result = convertDocument(
      doc([
        el("div", {
          box: { x: 1, y: 1, w: 2, h: 1 },
          style: { backgroundImage: "linear-gradient(90deg, rgb(255, 0, 0), rgb(0, 0, 255))" },
        }),
      ])
    );
    expect(issueKinds(result)).toEqual(["UnsupportedGradient"]);
  });

  it("reports box styling on a text element", () => {
    const result = convertDocument(
      doc([el("h1", { style: { backgroundColor: "rgb(255, 255, 0)" } }, ["Title"])])
    );
    expect(issueKinds(result)).toEqual(["StyleOnTextElement"]);
  });

  it("reports a declared canvas that differs from the request", () => {
    const result = convertDocument(doc([], { width: 13.333, height: 7.5 }));
    expect(issueKinds(result)).toEqual(["DimensionMismatch"]);
  });

  it("accepts a custom canvas when it is requested", () => {
    const result = convertDocument(doc([], { width: 13.333, height: 7.5 }), {
      canvas: { width: 13.333, height: 7.5 },
    });
    expect(success(result).canvas).toEqual({ width: 13.333, height: 7.5 });
  });

  it("exposes placeholder regions", () => {
    const result = success(
      convertDocument(doc([el("div", { id: "chart", classes: ["placeholder"], box: { x: 1, y: 1, w: 4, h: 3 } })]))
    );
    expect(result.placeholders).toEqual([{ id: "chart", x: 1, y: 1, w: 4, h: 3 }]);
    expect(result.primitives).toEqual([
      { kind: "placeholder", id: "chart", box: { x: 1, y: 1, w: 4, h: 3 }, z: 0 },
    ]);
  });

  it("honours a custom placeholder marker class", () => {
    const result = success(
      convertDocument(doc([el("div", { id: "map", classes: ["slot"], box: { x: 1, y: 1, w: 2, h: 2 } })]), {
        placeholderClass: "slot",
      })
    );
    expect(result.placeholders.map((p) => p.id)).toEqual(["map"]);
  });

  it("fits an image to its natural aspect ratio", () => {
    const result = success(
      convertDocument(
        doc([
          el("img", {
            src: "data:image/png;base64,AAAA",
            naturalSize: { w: 192, h: 96 },
            box: { x: 0, y: 0, w: 4, h: 4 },
          }),
        ])
      )
    );
    expect(result.primitives[0]).toEqual({
      kind: "image",
      id: "body/img[0]",
      box: { x: 0, y: 1, w: 4, h: 2 },
      z: 0,
      src: "data:image/png;base64,AAAA",
    });
  });

  it("drops an inset shadow and tells the logger", () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const result = success(
      convertDocument(
        doc([
          el("div", {
            style: {
              backgroundColor: "rgb(255, 255, 255)",
              boxShadow: "rgba(0, 0, 0, 0.5) 0px 0px 4px 0px inset",
            },
          }),
        ]),
        { logger }
      )
    );
    const shape = result.primitives[0];
    if (shape?.kind !== "shape") throw new Error("expected a shape primitive");
    expect(shape.shadow).toBeUndefined();
    expect(logger.debug).toHaveBeenCalledWith("body/div[0]: inset box-shadow dropped");
  });

  it("ignores untagged text in a generic container and logs it", () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const result = success(
      convertDocument(
        doc([el("div", { style: { backgroundColor: "rgb(255, 255, 255)" } }, ["loose text"])]),
        { logger }
      )
    );
    expect(result.primitives.map((p) => p.kind)).toEqual(["shape"]);
    expect(logger.debug).toHaveBeenCalledWith("body/div[0]: untagged text ignored");
  });

  it("warns about a hand-typed bullet symbol", () => {
    const result = success(convertDocument(doc([el("p", {}, ["• First point"])])));
    expect(result.warnings).toEqual([
      {
        kind: "ManualBulletSymbol",
        node: { path: "body/p[0]", tag: "p" },
        detail: "text starts with a typed bullet symbol; use <ul> or <ol> instead",
      },
    ]);
  });

  it("truncates text to the configured limit", () => {
    const result = success(convertDocument(doc([el("p", {}, ["Hello world"])]), { textLimit: 5 }));
    expect(result.primitives[0]).toMatchObject({ runs: [{ text: "Hello" }] });
  });

  it("produces identical output for identical input", () => {
    const input = doc([
      el("div", { style: { backgroundColor: "rgb(10, 20, 30)", borderRadius: "8px" } }, [
        el("p", {}, ["Same ", el("b", {}, ["every"]), " time"]),
      ]),
    ]);
    expect(JSON.stringify(convertDocument(input))).toBe(JSON.stringify(convertDocument(input)));
  });

  it("rejects invalid options", () => {
    expect(() => convertDocument(doc([]), { precision: -1 })).toThrow(ZodError);
  });
});

describe("unwrapConversion", () => {
  it("returns the success payload", () => {
    const result = convertDocument(doc([el("p", {}, ["ok"])]));
    expect(unwrapConversion(result).primitives).toHaveLength(1);
  });

  it("throws every issue at once", () => {
    const result = convertDocument(
      doc([
        el("h1", { box: { x: 9, y: 1, w: 2, h: 1 }, style: { backgroundColor: "rgb(255, 0, 0)" } }, ["Wide"]),
      ])
    );
    let caught: unknown;
    try {
      unwrapConversion(result);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConversionFailedError);
    if (!(caught instanceof ConversionFailedError)) return;
    expect(caught.issues.map((i) => i.kind)).toEqual(["StyleOnTextElement", "Overflow"]);
    expect(caught.message).toContain("Conversion failed with 2 issue(s):");
  });
});
