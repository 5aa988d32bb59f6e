import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  convertNotebookFile,
  convertNotebookFiles,
  defaultOutputPath,
  diagnoseFiles,
  findNotebooks,
  formatDate,
  titleFromFileName,
  validateMarkdownFile,
  writePreviewFile,
} from "../orchestrator.js";
import { IOError, ParseError } from "../utils/error-handler.js";

const NOW = new Date(2024, 0, 5);

const NOTEBOOK = JSON.stringify({
  cells: [
    { cell_type: "markdown", source: ["# Sales\n", "Monthly numbers"] },
    {
      cell_type: "code",
      source: ["plt.plot(x)\n", "plt.show()"],
      outputs: [{ output_type: "display_data", data: { "image/png": "iVBORw0KGgo=", "text/plain": "<Figure>" } }],
    },
  ],
});

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "nb-post-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeFixture(name: string, content: string): string {
  const filePath = join(dir, name);
  writeFileSync(filePath, content, "utf-8");
  return filePath;
}

describe("titleFromFileName", () => {
  it("replaces separators and title-cases words", () => {
    expect(titleFromFileName("my-first_notebook")).toBe("My First Notebook");
    expect(titleFromFileName("DATA analysis 2nd")).toBe("Data Analysis 2Nd");
    expect(titleFromFileName("élan_über-straße")).toBe("Élan Über Straße");
  });
});

describe("defaultOutputPath", () => {
  it("prefixes the notebook name with the local date", () => {
    expect(formatDate(NOW)).toBe("2024-01-05");
    expect(defaultOutputPath("/notebooks/sales-report.ipynb", "/posts", NOW)).toBe(
      join("/posts", "2024-01-05-sales-report.md")
    );
  });
});

describe("convertNotebookFile", () => {
  it("writes a dated post into the working directory by default", () => {
    const notebookPath = writeFixture("sales-report.ipynb", NOTEBOOK);

    const result = convertNotebookFile(notebookPath, {
      cwd: dir,
      now: NOW,
      layout: "single",
      categories: "data",
      tags: ["pandas"],
      toc: true,
      authorProfile: false,
    });

    expect(result.outputPath).toBe(join(dir, "2024-01-05-sales-report.md"));
    expect(result.title).toBe("Sales Report");
    expect(readFileSync(result.outputPath, "utf-8")).toBe(
      [
        "---",
        "layout: single",
        'title: "Sales Report"',
        "categories: data",
        "tag: ['pandas']",
        "toc: true",
        "author_profile: false",
        "---",
        "",
        "# Sales\nMonthly numbers",
        "",
        "```python\nplt.plot(x)\nplt.show()\n```",
        "",
        "![output](data:image/png;base64,iVBORw0KGgo=)",
        "",
      ].join("\n")
    );
  });

  it("creates missing parent directories for an explicit output", () => {
    const notebookPath = writeFixture("a.ipynb", NOTEBOOK);
    const output = join(dir, "posts", "2024", "a.md");

    convertNotebookFile(notebookPath, { output, title: "A" });
    convertNotebookFile(notebookPath, { output, title: "A" });

    expect(readFileSync(output, "utf-8")).toContain('title: "A"');
  });

  it("writes nothing when the notebook cannot be parsed", () => {
    const notebookPath = writeFixture("broken.ipynb", "{ not json");
    const output = join(dir, "broken.md");

    expect(() => convertNotebookFile(notebookPath, { output })).toThrow(ParseError);
    expect(existsSync(output)).toBe(false);
  });

  it("throws IOError for a missing notebook", () => {
    expect(() => convertNotebookFile(join(dir, "missing.ipynb"), { cwd: dir })).toThrow(IOError);
  });
});

describe("batch conversion", () => {
  it("finds notebooks and converts each one independently", async () => {
    writeFixture("b.ipynb", "[1, 2]");
    writeFixture("a.ipynb", NOTEBOOK);
    writeFixture("notes.md", "# not a notebook");

    const files = await findNotebooks("*.ipynb", dir);
    expect(files).toEqual([join(dir, "a.ipynb"), join(dir, "b.ipynb")]);

    const results = convertNotebookFiles(files, { outputDir: join(dir, "out"), now: NOW });
    expect(results.map((result) => result.success)).toEqual([true, false]);
    expect(results[0]?.outputPath).toBe(join(dir, "out", "2024-01-05-a.md"));
    expect(existsSync(join(dir, "out", "2024-01-05-a.md"))).toBe(true);
    expect(results[1]?.error).toMatch(/^Notebook has an unexpected structure/);
  });
});

describe("validateMarkdownFile", () => {
  it("validates the images of a converted post", () => {
    const notebookPath = writeFixture("plots.ipynb", NOTEBOOK);
    const { outputPath } = convertNotebookFile(notebookPath, { cwd: dir, now: NOW });

    const report = validateMarkdownFile(outputPath);
    expect(report.totalImages).toBe(1);
    expect(report.validImages).toBe(1);
  });
});

describe("writePreviewFile", () => {
  it("writes an HTML preview next to the markdown file", () => {
    const markdownPath = writeFixture("post.md", "![output](data:image/png;base64,iVBORw0KGgo=)\n");

    const previewPath = writePreviewFile(markdownPath);

    expect(previewPath).toBe(join(dir, "post_preview.html"));
    expect(readFileSync(previewPath, "utf-8")).toContain(
      '<img src="data:image/png;base64,iVBORw0KGgo=" alt="output" style="max-width: 100%; height: auto;">'
    );
  });
});

describe("diagnoseFiles", () => {
  it("writes a report combining markdown and notebook analysis", () => {
    const markdownPath = writeFixture("post.md", "![output](data:image/png;base64,iVBORw0K\nGgo=)\n");
    const notebookPath = writeFixture("post.ipynb", NOTEBOOK);

    const { reportPath, snapshot } = diagnoseFiles(markdownPath, { notebookPath, now: NOW });

    expect(reportPath).toBe(join(dir, "post_debug.txt"));
    expect(snapshot.notebook?.pngOutputs).toHaveLength(1);
    const lines = readFileSync(reportPath, "utf-8").split("\n");
    expect(lines).toContain("Images matched (strict pattern): 0");
    expect(lines).toContain("Images matched (lenient pattern): 1");
    expect(lines).toContain(`Notebook: ${notebookPath}`);
    expect(lines).toContain("PNG outputs: 1");
  });
});
