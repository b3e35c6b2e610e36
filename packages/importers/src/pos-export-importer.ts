import * as XLSX from "xlsx";
import { posExportRowSchema, type RawOrderLine } from "@teabase/contracts";
import type { PosCleanStats, PosExportParseResult, ValidationError } from "./types.js";
import { readSheetRows, type SheetRow } from "./workbook.js";

const SHEET = "pos_export";

/** CJK Extension A, Unified Ideographs and Compatibility Ideographs. */
const CJK_PATTERN = /[\u3400-\u4DBF\u4E00-\u9FFF\uF900-\uFAFF]/g;

const ICE_TOKEN = /\b(?:no\s*ice|\d{1,3}\s*%\s*ice)\b/i;

export const DEFAULT_REWARD_ITEMS = ["Free Drink (100☼ Reward)"];

/** Drinks always served over full ice; an export row without an ice modifier gets "100% Ice". */
export const DEFAULT_FIXED_ICE_ITEMS = ["Strawberry Matcha Latte", "Mango Matcha Latte", "Chestnut Forest"];

export type PosCleanOptions = {
  rewardItems?: string[];
  fixedIceItems?: string[];
};

export function stripCjk(value: string): string {
  return value.replace(CJK_PATTERN, "").replace(/\s+/g, " ").trim();
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** YYYY-MM-DD from an ISO date or datetime, M/D/YYYY, or an Excel serial day. */
export function normalizeExportDate(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    const parsed = XLSX.SSF.parse_date_code(value);
    if (!parsed || !parsed.y) return null;
    return `${parsed.y}-${pad2(parsed.m)}-${pad2(parsed.d)}`;
  }
  if (typeof value !== "string") return null;
  const trimmed = value.trim();

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T].*)?$/.exec(trimmed);
  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})(?:\s.*)?$/.exec(trimmed);
  let year: number;
  let month: number;
  let day: number;
  if (iso) {
    year = Number(iso[1]);
    month = Number(iso[2]);
    day = Number(iso[3]);
  } else if (us) {
    const rawYear = Number(us[3]);
    year = rawYear < 100 ? 2000 + rawYear : rawYear;
    month = Number(us[1]);
    day = Number(us[2]);
  } else {
    return null;
  }

  const check = new Date(Date.UTC(year, month - 1, day));
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

function emptyStats(sourceRows: number): PosCleanStats {
  return {
    sourceRows,
    paymentRows: 0,
    refundRows: 0,
    paymentQty: 0,
    refundQty: 0,
    rewardRows: 0,
    rewardQty: 0,
    fixedIceRows: 0,
    invalidRows: 0,
    keptRows: 0
  };
}

/**
 * Keep sell-through demand only: payment rows with positive quantity.
 * Refunds are counted, reward redemptions dropped, CJK stripped from
 * category and item names. Rows with an unreadable date or quantity are
 * skipped and reported.
 */
export function cleanPosRows(rawRows: SheetRow[], options: PosCleanOptions = {}): PosExportParseResult {
  const rewardItems = new Set(options.rewardItems ?? DEFAULT_REWARD_ITEMS);
  const fixedIceItems = new Set(options.fixedIceItems ?? DEFAULT_FIXED_ICE_ITEMS);
  const stats = emptyStats(rawRows.length);
  const errors: ValidationError[] = [];
  const lines: RawOrderLine[] = [];

  rawRows.forEach((row, idx) => {
    const rowNumber = idx + 2;
    const parsed = posExportRowSchema.safeParse(row);
    if (!parsed.success) {
      stats.invalidRows += 1;
      errors.push({
        sheet: SHEET,
        rowNumber,
        code: "INVALID_ROW",
        message: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
      });
      return;
    }

    const data = parsed.data;
    const date = normalizeExportDate(data.Date);
    if (!date) {
      stats.invalidRows += 1;
      errors.push({ sheet: SHEET, rowNumber, code: "INVALID_DATE", message: `Unreadable date: ${data.Date}` });
      return;
    }

    const event = data["Event Type"].trim().toLowerCase();
    const isPayment = event === "payment";
    if (isPayment) {
      stats.paymentRows += 1;
      stats.paymentQty += data.Qty;
    }
    if (event === "refund" || data.Qty < 0) {
      stats.refundRows += 1;
      stats.refundQty += data.Qty;
    }
    if (!isPayment || data.Qty <= 0) return;

    const itemName = stripCjk(data.Item);
    if (rewardItems.has(data.Item.trim()) || rewardItems.has(itemName)) {
      stats.rewardRows += 1;
      stats.rewardQty += data.Qty;
      return;
    }

    let modifiers = data["Modifiers Applied"].trim();
    if (fixedIceItems.has(itemName) && !ICE_TOKEN.test(modifiers)) {
      modifiers = modifiers ? `${modifiers}, 100% Ice` : "100% Ice";
      stats.fixedIceRows += 1;
    }

    lines.push({
      rowNumber,
      orderId: data["Transaction ID"] ?? null,
      date,
      time: data.Time ?? null,
      category: stripCjk(data.Category),
      itemName,
      modifiers,
      quantity: data.Qty
    });
  });

  stats.keptRows = lines.length;
  return { lines, stats, errors };
}

export function parsePosExport(filePath: string, options: PosCleanOptions = {}): PosExportParseResult {
  return cleanPosRows(readSheetRows(filePath), options);
}
