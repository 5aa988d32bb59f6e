/**
 * Command definitions for the nb-post CLI
 */

import { Command } from "commander";
import chalk from "chalk";
import { basename } from "path";
import {
  convertNotebookFile,
  convertNotebookFiles,
  diagnoseFiles,
  findNotebooks,
  validateMarkdownFile,
  writePreviewFile,
} from "./orchestrator.js";
import { handleCliError } from "./utils/error-handler.js";
import { formatImageLines, formatValidationSummary } from "./utils/formatters.js";
import { setLogLevel } from "./utils/logger.js";

interface ConvertCommandOptions {
  output?: string;
  title?: string;
  categories?: string;
  tags?: string[];
  layout?: string;
}

interface BatchCommandOptions {
  output?: string;
  categories?: string;
  tags?: string[];
}

interface ValidateCommandOptions {
  preview?: boolean;
}

interface DiagnoseCommandOptions {
  notebook?: string;
  output?: string;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("nb-post")
    .description("Convert Jupyter notebooks into Markdown posts with embedded images")
    .version("1.0.0")
    .option("--verbose", "debug logging")
    .hook("preAction", (command) => {
      if (command.opts<{ verbose?: boolean }>().verbose) {
        setLogLevel("debug");
      }
    });

  program
    .command("convert <notebook>")
    .description("Convert a notebook (.ipynb) into a Markdown post")
    .option("-o, --output <path>", "output path for the .md file")
    .option("-t, --title <title>", "post title")
    .option("-c, --categories <categories>", "post categories")
    .option("--tags <tags...>", "post tags")
    .option("--layout <layout>", "front matter layout")
    .action((notebook: string, options: ConvertCommandOptions) => {
      try {
        console.log(`${chalk.blue("🔄 Converting...")} ${notebook}`);
        const result = convertNotebookFile(notebook, options);
        console.log(`${chalk.green("✅ Converted notebook to:")} ${result.outputPath}`);
        console.log(chalk.green("✅ All images embedded as base64"));
      } catch (error) {
        handleCliError(error, "Conversion failed");
      }
    });

  program
    .command("batch <pattern>")
    .description("Convert every notebook matching a glob pattern")
    .option("-o, --output <dir>", "output directory")
    .option("-c, --categories <categories>", "post categories")
    .option("--tags <tags...>", "post tags")
    .action(async (pattern: string, options: BatchCommandOptions) => {
      try {
        const files = await findNotebooks(pattern);
        if (files.length === 0) {
          console.log(chalk.yellow("⚠️  No matching notebooks found"));
          return;
        }

        console.log(chalk.blue(`🔄 Converting ${files.length} notebooks...`));
        const results = convertNotebookFiles(files, {
          outputDir: options.output,
          categories: options.categories,
          tags: options.tags,
        });

        for (const result of results) {
          if (result.success) {
            console.log(`${chalk.green("  ✅")} ${basename(result.sourcePath)} → ${basename(result.outputPath)}`);
          } else {
            console.log(`${chalk.red("  ❌")} ${basename(result.sourcePath)} - ${result.error ?? ""}`);
          }
        }

        const failed = results.filter((result) => !result.success).length;
        if (failed > 0) {
          process.exitCode = 1;
        }
        console.log(chalk.green(`\n✅ Batch finished: ${results.length - failed}/${results.length} converted`));
      } catch (error) {
        handleCliError(error, "Batch conversion failed");
      }
    });

  program
    .command("validate <markdown>")
    .description("Validate base64 images embedded in a Markdown file")
    .option("--preview", "also write an HTML preview next to the file")
    .action((markdown: string, options: ValidateCommandOptions) => {
      try {
        const report = validateMarkdownFile(markdown);

        console.log(`\n${"=".repeat(60)}`);
        console.log(`Validating: ${markdown}`);
        console.log(`${"=".repeat(60)}\n`);
        console.log(formatImageLines(report).join("\n"));
        const summary = formatValidationSummary(report).join("\n");
        console.log(report.invalidImages > 0 ? chalk.yellow(summary) : chalk.green(summary));

        if (options.preview) {
          const previewPath = writePreviewFile(markdown);
          console.log(`${chalk.green("✅ Preview HTML created:")} ${previewPath}`);
          console.log(chalk.gray("  Open it in a browser to check that images render."));
        }

        if (report.invalidImages > 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        handleCliError(error, "Validation failed");
      }
    });

  program
    .command("diagnose <markdown>")
    .description("Write a diagnostic report for images that do not render")
    .option("-n, --notebook <path>", "source notebook to cross-check")
    .option("-o, --output <path>", "report path")
    .action((markdown: string, options: DiagnoseCommandOptions) => {
      try {
        const { reportPath, snapshot } = diagnoseFiles(markdown, {
          notebookPath: options.notebook,
          output: options.output,
        });
        console.log(`${chalk.green("✅ Diagnostic report written:")} ${reportPath}`);
        console.log(
          chalk.gray(`  ${snapshot.images.length} images found, ${snapshot.strictMatchCount} well-formed`)
        );
        if (snapshot.notebookError !== undefined) {
          console.log(chalk.yellow(`⚠️  Notebook could not be read: ${snapshot.notebookError}`));
        }
      } catch (error) {
        handleCliError(error, "Diagnosis failed");
      }
    });

  return program;
}
