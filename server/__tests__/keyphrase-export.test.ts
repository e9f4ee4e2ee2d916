import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import type { RunResult } from "@shared/schema";
import { buildRunOutput, keyphrasesToCsv, writeRunOutput } from "../keyphrase-export";

const result: RunResult = {
  keyphrases: [
    { text: "ACH payment", category: "reference", score: 4 },
    { text: "wire, transfer", category: "guide", score: 2.5 },
  ],
  auditLog: [{ reason: "Stoplisted", text: "API", documentId: "r1", category: "reference" }],
  summary: {
    admittedCount: 2,
    globalTarget: 5,
    discrepancy: 3,
    categories: { reference: 1, guide: 1 },
    clusterCount: 2,
    documentsProcessed: 1,
    documentsDegraded: 0,
    documentsSkipped: 0,
    cancelled: false,
  },
  byDocument: { r1: { category: "reference", status: "success", keyphrases: ["ACH payment", "API"] } },
};

describe("keyphrasesToCsv", () => {
  it("writes a header and quotes fields that need it", () => {
    expect(keyphrasesToCsv(result.keyphrases)).toBe(
      'text,category,score\nACH payment,reference,4\n"wire, transfer",guide,2.5\n',
    );
  });
});

describe("writeRunOutput", () => {
  it("writes the run and the CSV, creating directories", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "keyphrase-out-"));
    const outputPath = path.join(dir, "out", "run.json");
    const csvPath = path.join(dir, "out", "run.csv");

    writeRunOutput(result, { outputPath, csvPath, configuration: { globalTarget: 5 } });

    const written: unknown = JSON.parse(fs.readFileSync(outputPath, "utf-8"));
    expect(written).toEqual(buildRunOutput(result, { globalTarget: 5 }));
    expect(fs.readFileSync(csvPath, "utf-8").split("\n")[0]).toBe("text,category,score");
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
