import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigurationError } from "@teabase/contracts";
import { OUTPUT_FILES, runRefresh } from "./index.js";
import type { RefreshConfig } from "./config.js";

const REFERENCE: Record<string, string> = {
  "modifier_token_map.csv": "raw_token,token_type,canonical_value,match\nBoba,topping,boba,\nGreen Tea,tea_base,green_tea,exact\n",
  "item_rules.csv":
    "category_key,item_key,default_tea_base,requires_tea_choice\nmosa_signature,tgy_special,tie_guan_yin,0\nfresh_fruit_tea,fresh_lemon_tea,,1\n",
  "ice_bucket_means.csv": "ice_pct,tea_base_ml\n50,520\n100,600\n",
  "batch_constants.csv":
    "tea_component,batch_key,batch_yield_ml,leaf_grams_per_batch,bag_grams\ntie_guan_yin,,6504,160,600\n"
};

const EXPORT = [
  "Date,Time,Transaction ID,Category,Item,Qty,Modifiers Applied,Event Type",
  "2026-01-05,09:00,T-1,Mosa Signature,TGY Special,2,50% Ice,Payment",
  '2026-01-05,09:05,T-2,Fresh Fruit Tea,Fresh Lemon Tea,1,"Green Tea, 50% Ice",Payment',
  "2026-01-05,09:06,T-2,Fresh Fruit Tea,Fresh Lemon Tea,1,100% Ice,Payment",
  "2026-01-06,10:00,T-3,Mosa Signature,TGY Special,-1,,Refund"
].join("\n");

function makeWorkspace(reference: Record<string, string> = REFERENCE): RefreshConfig {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "teabase-refresh-"));
  const referenceDir = path.join(root, "reference");
  fs.mkdirSync(referenceDir);
  for (const [name, content] of Object.entries(reference)) {
    fs.writeFileSync(path.join(referenceDir, name), content, "utf8");
  }
  const rawInput = path.join(root, "pos_export.csv");
  fs.writeFileSync(rawInput, `${EXPORT}\n`, "utf8");
  return { rawInput, referenceDir, outputDir: path.join(root, "output"), runOptions: {} };
}

function readLines(config: RefreshConfig, file: string): string[] {
  return fs.readFileSync(path.join(config.outputDir, file), "utf8").trimEnd().split("\n");
}

describe("runRefresh", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes every report", () => {
    const config = makeWorkspace();
    const summary = runRefresh(config);
    expect(summary.written).toHaveLength(Object.keys(OUTPUT_FILES).length);
    for (const file of Object.values(OUTPUT_FILES)) {
      expect(fs.existsSync(path.join(config.outputDir, file))).toBe(true);
    }
  });

  it("aggregates kept drinks by day and component", () => {
    const config = makeWorkspace();
    runRefresh(config);
    expect(readLines(config, OUTPUT_FILES.daily)).toEqual([
      "Date,component,drink_count,tea_ml_total",
      "2026-01-05,green,1,520",
      "2026-01-05,tie_guan_yin,2,1040"
    ]);
  });

  it("reports cleaning and resolution counts", () => {
    const config = makeWorkspace();
    const summary = runRefresh(config);
    expect(summary.stats.keptRows).toBe(3);
    expect(summary.stats.refundRows).toBe(1);
    expect(summary.metrics.resolutionCounts.missing_choice).toBe(1);
    const validation = readLines(config, OUTPUT_FILES.validation);
    expect(validation).toContain("tea_resolution_missing_choice,1");
    expect(validation).toContain("refund_rows,1");
  });

  it("writes a header-only unknown token report when every token is known", () => {
    const config = makeWorkspace();
    runRefresh(config);
    expect(readLines(config, OUTPUT_FILES.unknownTokens)).toEqual(["token,count"]);
  });

  it("writes nothing when a constant is invalid", () => {
    const config = makeWorkspace({
      ...REFERENCE,
      "batch_constants.csv":
        "tea_component,batch_key,batch_yield_ml,leaf_grams_per_batch,bag_grams\ntie_guan_yin,,0,160,600\n"
    });
    expect(() => runRefresh(config)).toThrow(ConfigurationError);
    expect(fs.existsSync(config.outputDir)).toBe(false);
  });
});
