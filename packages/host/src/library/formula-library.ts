// ─── Formula Library ───────────────────────────────────────────────
// Moves (id, expression) pairs between JSON documents and a registry.
// Files are plain UTF-8 JSON; snapshots are the same JSON gzipped.
//
// Document shape:
//   { "formulas": [ { "id": "damage", "expression": "base * 2" } ] }

import { readFile, writeFile } from "node:fs/promises";
import pako from "pako";

import {
  safeParseFormulaLibrary,
  type FormulaDefinition,
  type FormulaLibraryDocument,
} from "@formula-engine/shared";

import { createConsoleLogger, describeError, type FormulaLogger } from "../logging/logger.js";
import type { FormulaRegistry } from "../registry/formula-registry.js";
import { formatZodIssues } from "./format-zod-issues.js";

export interface FormulaLibraryOptions {
  readonly logger?: FormulaLogger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FormulaLibrary {
  private readonly logger: FormulaLogger;

  constructor(
    private readonly registry: FormulaRegistry,
    options: FormulaLibraryOptions = {}
  ) {
    this.logger = options.logger ?? createConsoleLogger("FormulaLibrary");
  }

  // ── Import ──

  /**
   * Validates a library document and registers its formulas.
   * Returns how many compiled; 0 when the document is rejected.
   */
  loadFromJson(json: string): number {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      this.logger.error(`Failed to load formulas from JSON: ${describeError(error)}`);
      return 0;
    }

    const result = safeParseFormulaLibrary(raw);
    if (!result.success) {
      this.logger.error(
        `Failed to load formulas from JSON: ${formatZodIssues(result.error.issues)}`
      );
      return 0;
    }

    return this.registry.registerMany(result.data.formulas);
  }

  async loadFromFile(filePath: string): Promise<number> {
    let json: string;
    try {
      json = await readFile(filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.error(`Formula file not found: ${filePath}`);
      } else {
        this.logger.error(
          `Failed to load formulas from file '${filePath}': ${describeError(error)}`
        );
      }
      return 0;
    }
    return this.loadFromJson(json);
  }

  /** Loads a snapshot produced by exportCompressed. */
  loadCompressed(bytes: Uint8Array): number {
    let json: string;
    try {
      json = pako.ungzip(bytes, { to: "string" });
    } catch (error) {
      this.logger.error(`Failed to load formulas from compressed data: ${describeError(error)}`);
      return 0;
    }
    return this.loadFromJson(json);
  }

  // ── Export ──

  /** The formulas under `ids` (default: all), skipping unknown ids. */
  toDocument(ids?: Iterable<string>): FormulaLibraryDocument {
    const formulas: FormulaDefinition[] = [];
    for (const id of ids ?? this.registry.ids()) {
      const expression = this.registry.expressionOf(id);
      if (expression !== undefined) {
        formulas.push({ id, expression });
      }
    }
    return { formulas };
  }

  /** Two-space indented JSON of toDocument(ids). */
  exportToJson(ids?: Iterable<string>): string {
    return JSON.stringify(this.toDocument(ids), null, 2);
  }

  async exportToFile(filePath: string, ids?: Iterable<string>): Promise<boolean> {
    try {
      await writeFile(filePath, `${this.exportToJson(ids)}\n`, "utf8");
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to export formulas to file '${filePath}': ${describeError(error)}`
      );
      return false;
    }
  }

  /** Gzipped exportToJson(ids). */
  exportCompressed(ids?: Iterable<string>): Uint8Array {
    return pako.gzip(this.exportToJson(ids));
  }
}
