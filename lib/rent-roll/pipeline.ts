/**
 * End-to-end rent roll processing: load → detect → extract → append → format → save.
 * Runs in the browser (upload page) and on the server (/api/process).
 * Detection and load failures come back as { ok: false } with no output; anything else throws.
 */

import ExcelJS from "exceljs";
import { HIGHLIGHT_ARGB, OUTPUT_PREFIX } from "@/lib/config";
import { WorkbookLoadError, StructureDetectionError } from "./errors";
import { extractRentRoll } from "./extractor";
import { autofitColumns, highlightColumns } from "./formatting";
import { appendResults } from "./result-writer";
import { worksheetGrid, type SectionHeaderClassifier } from "./sheet";
import { detectStructure } from "./structure-detector";
import type { ColumnMap, RentRollLogger, StructureWarning } from "./types";

export type ProcessingStage = "detecting-structure" | "extracting-charges" | "appending-data" | "highlighting";

/** Locked order; the progress indicator renders these as-is. */
export const PROCESSING_STAGES: ReadonlyArray<{ stage: ProcessingStage; label: string; progress: number }> = [
  { stage: "detecting-structure", label: "Detecting structure…", progress: 25 },
  { stage: "extracting-charges", label: "Extracting charges…", progress: 50 },
  { stage: "appending-data", label: "Appending extracted data…", progress: 75 },
  { stage: "highlighting", label: "Adjusting column widths and highlighting…", progress: 90 },
];

export interface ProcessHooks {
  onStage?: (stage: ProcessingStage) => void;
  onWarning?: (warning: StructureWarning) => void;
  isSectionHeader?: SectionHeaderClassifier;
  highlightArgb?: string;
  logger?: RentRollLogger;
}

export interface ProcessSummary {
  columns: ColumnMap;
  unitCount: number;
  codes: string[];
  /** Sum of every unit's "total" row. */
  totalAmount: number;
  appendedColumns: number[];
  warnings: StructureWarning[];
}

export type ProcessResult =
  | { ok: true; fileName: string; buffer: ExcelJS.Buffer; summary: ProcessSummary }
  | { ok: false; error: string };

export function outputFileName(fileName: string): string {
  return `${OUTPUT_PREFIX}${fileName}`;
}

/** Open the workbook and pick its active sheet (first sheet when none is marked). */
export async function loadWorksheet(
  data: ArrayBuffer
): Promise<{ workbook: ExcelJS.Workbook; worksheet: ExcelJS.Worksheet }> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(data);
  } catch (e) {
    throw new WorkbookLoadError("Could not read the file as an .xlsx workbook.", { cause: e });
  }
  const activeTab = workbook.views?.[0]?.activeTab ?? 0;
  const worksheet = workbook.worksheets[activeTab] ?? workbook.worksheets[0];
  if (!worksheet) {
    throw new WorkbookLoadError("The workbook has no worksheets.");
  }
  return { workbook, worksheet };
}

export async function processRentRoll(
  data: ArrayBuffer,
  fileName: string,
  hooks: ProcessHooks = {}
): Promise<ProcessResult> {
  const logger = hooks.logger ?? console;
  const warnings: StructureWarning[] = [];
  const onWarning = (warning: StructureWarning) => {
    warnings.push(warning);
    hooks.onWarning?.(warning);
  };

  try {
    const { workbook, worksheet } = await loadWorksheet(data);
    const sheet = worksheetGrid(worksheet);

    hooks.onStage?.("detecting-structure");
    const columns = detectStructure(sheet, { onWarning, logger });

    hooks.onStage?.("extracting-charges");
    const { units, codes } = extractRentRoll(sheet, columns, { isSectionHeader: hooks.isSectionHeader, logger });

    hooks.onStage?.("appending-data");
    const appendedColumns = appendResults(sheet, units, codes, columns);

    hooks.onStage?.("highlighting");
    autofitColumns(worksheet, appendedColumns);
    highlightColumns(worksheet, appendedColumns, hooks.highlightArgb ?? HIGHLIGHT_ARGB);

    const buffer = await workbook.xlsx.writeBuffer();
    const summary: ProcessSummary = {
      columns,
      unitCount: units.length,
      codes,
      totalAmount: units.reduce((sum, u) => sum + u.total, 0),
      appendedColumns,
      warnings,
    };
    logger.info("[rent-roll] processed", { fileName, units: summary.unitCount, codes: codes.length });
    return { ok: true, fileName: outputFileName(fileName), buffer, summary };
  } catch (e) {
    if (e instanceof StructureDetectionError || e instanceof WorkbookLoadError) {
      logger.warn("[rent-roll] failed", { fileName, error: e.message });
      return { ok: false, error: e.message };
    }
    throw e;
  }
}
