import { describe, it, expect } from "vitest";
import { renderCell, renderOutput, selectOutputMimeType } from "../cell-renderer.js";
import type { CodeCell } from "../types/notebook.js";

function codeCell(source: string, outputs: CodeCell["outputs"] = []): CodeCell {
  return { kind: "code", index: 0, source, outputs };
}

describe("selectOutputMimeType", () => {
  it("prefers PNG over every other representation", () => {
    expect(
      selectOutputMimeType({ "text/plain": "<Figure>", "text/html": "<div/>", "image/png": "AAAA" })
    ).toBe("image/png");
  });

  it("falls through the priority list in order", () => {
    expect(selectOutputMimeType({ "text/plain": "x", "image/jpeg": "y" })).toBe("image/jpeg");
    expect(selectOutputMimeType({ "text/plain": "x", "image/svg+xml": "<svg/>" })).toBe("image/svg+xml");
    expect(selectOutputMimeType({ "text/plain": "x", "text/html": "<b/>" })).toBe("text/html");
    expect(selectOutputMimeType({ "text/plain": "x" })).toBe("text/plain");
  });

  it("returns undefined when no handled type is present", () => {
    expect(selectOutputMimeType({ "text/latex": "$x$" })).toBeUndefined();
  });
});

describe("renderCell", () => {
  it("emits markdown source verbatim, even when empty", () => {
    expect(renderCell({ kind: "markdown", index: 0, source: "# Hello *world*" }, "python")).toEqual([
      "# Hello *world*",
    ]);
    expect(renderCell({ kind: "markdown", index: 0, source: "" }, "python")).toEqual([""]);
  });

  it("fences code with the notebook language and strips trailing whitespace only", () => {
    expect(renderCell(codeCell("\n  x = 1\n\n  y = 2  \n\n"), "python")).toEqual([
      "```python\n\n  x = 1\n\n  y = 2\n```",
    ]);
  });

  it("renders nothing for a whitespace-only cell without outputs", () => {
    expect(renderCell(codeCell("  \n\t"), "python")).toEqual([]);
  });

  it("still renders outputs of a blank code cell", () => {
    expect(renderCell(codeCell("", [{ kind: "stream", text: "done\n" }]), "python")).toEqual([
      "```\ndone\n```",
    ]);
  });

  it("keeps output order for cells with several output types", () => {
    const cell = codeCell("plot()", [
      { kind: "stream", text: "start\n" },
      { kind: "display_data", data: { "image/png": "iVBORw0KGgo=", "text/plain": "<Figure>" } },
      { kind: "execute_result", data: { "text/html": "<table></table>", "text/plain": "df" } },
      { kind: "error", traceback: ["Traceback (most recent call last)", "KeyError: 'x'"] },
    ]);

    expect(renderCell(cell, "python")).toEqual([
      "```python\nplot()\n```",
      "```\nstart\n```",
      "![output](data:image/png;base64,iVBORw0KGgo=)",
      "<table></table>",
      "```python\nTraceback (most recent call last)\nKeyError: 'x'\n```",
    ]);
  });
});

describe("renderOutput", () => {
  it("renders PNG and not HTML when both are present", () => {
    expect(
      renderOutput({ kind: "display_data", data: { "text/html": "<img>", "image/png": "AAAA" } }, "python")
    ).toEqual(["![output](data:image/png;base64,AAAA)"]);
  });

  it("renders JPEG payloads as data URIs", () => {
    expect(renderOutput({ kind: "display_data", data: { "image/jpeg": "/9j/4A==" } }, "python")).toEqual([
      "![output](data:image/jpeg;base64,/9j/4A==)",
    ]);
  });

  it("passes SVG through untouched", () => {
    expect(
      renderOutput({ kind: "display_data", data: { "image/svg+xml": '<svg width="1"></svg>\n' } }, "python")
    ).toEqual(['<svg width="1"></svg>\n']);
  });

  it("fences non-blank plain text and skips blank plain text", () => {
    expect(renderOutput({ kind: "execute_result", data: { "text/plain": "42\n" } }, "python")).toEqual([
      "```\n42\n```",
    ]);
    expect(renderOutput({ kind: "execute_result", data: { "text/plain": " \n" } }, "python")).toEqual([]);
  });

  it("silently drops outputs without a handled MIME type", () => {
    expect(renderOutput({ kind: "display_data", data: { "text/markdown": "**x**" } }, "python")).toEqual([]);
  });

  it("skips blank streams and empty tracebacks", () => {
    expect(renderOutput({ kind: "stream", text: "\n\n" }, "python")).toEqual([]);
    expect(renderOutput({ kind: "error", traceback: [] }, "python")).toEqual([]);
  });

  it("tags tracebacks with the notebook language", () => {
    expect(renderOutput({ kind: "error", traceback: ["oops"] }, "julia")).toEqual(["```julia\noops\n```"]);
  });
});
