"use client";

import { useCallback, useEffect, useState } from "react";
import { ProcessingProgress } from "@/components/ProcessingProgress";
import { RentRollUpload } from "@/components/RentRollUpload";
import { RevealCard } from "@/components/RevealCard";
import { XLSX_MIME } from "@/lib/config";
import { formatCount, formatCurrency } from "@/lib/format";
import { processRentRoll, type ProcessSummary, type ProcessingStage } from "@/lib/rent-roll";

interface ProcessedFile {
  fileName: string;
  url: string;
  summary: ProcessSummary;
}

export default function RentRollPage() {
  const [file, setFile] = useState<File | null>(null);
  const [stage, setStage] = useState<ProcessingStage | "done" | null>(null);
  const [processed, setProcessed] = useState<ProcessedFile | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  // Release the previous download URL whenever the result changes or the page unmounts.
  useEffect(() => {
    if (!processed) return;
    return () => URL.revokeObjectURL(processed.url);
  }, [processed]);

  const onFileSelected = useCallback((f: File) => {
    setFile(f);
    setProcessed(null);
    setStage(null);
  }, []);

  const onUploadError = useCallback((message: string) => {
    setError(message || null);
  }, []);

  const start = useCallback(async () => {
    if (!file) return;
    setLoading(true);
    setError(null);
    setProcessed(null);
    setStage(null);
    try {
      const data = await file.arrayBuffer();
      const result = await processRentRoll(data, file.name, { onStage: setStage });
      if (!result.ok) {
        setStage(null);
        setError(result.error);
        return;
      }
      const blob = new Blob([result.buffer], { type: XLSX_MIME });
      setProcessed({ fileName: result.fileName, url: URL.createObjectURL(blob), summary: result.summary });
      setStage("done");
    } catch (e) {
      console.error("[rent-roll] processing error", e);
      setStage(null);
      setError(e instanceof Error ? e.message : String(e));
    } finally {
      setLoading(false);
    }
  }, [file]);

  return (
    <main className="app-container pt-24 pb-14 max-w-4xl">
      <h1 className="text-2xl font-semibold text-slate-100 tracking-tight mb-2">Rent Charge Codes Extractor</h1>
      <p className="text-sm text-slate-300 mb-6">
        Extracts per-unit charge codes from a Rent Roll or Affordable Rent Roll workbook and appends the totals
        beside each unit.
      </p>

      <RevealCard title="Upload rent roll">
        <RentRollUpload file={file} disabled={loading} onFileSelected={onFileSelected} onError={onUploadError} />
        <div className="mt-4 flex flex-wrap items-center gap-4">
          <button
            type="button"
            onClick={start}
            disabled={!file || loading}
            className="btn-premium btn-premium-primary disabled:opacity-50"
          >
            {loading ? "Extracting…" : "Start Extracting"}
          </button>
        </div>
        <ProcessingProgress stage={stage} />
        {error && <p className="mt-3 text-sm text-red-200">Error: {error}</p>}
      </RevealCard>

      {processed && (
        <div className="mt-6">
          <RevealCard kicker="Processing completed" title={processed.fileName} delay={0.1}>
            <ul className="text-sm text-slate-300 space-y-1 mb-4">
              <li>{formatCount(processed.summary.unitCount, "unit")} extracted</li>
              <li>
                {formatCount(processed.summary.codes.length, "charge code")}
                {processed.summary.codes.length > 0 ? `: ${processed.summary.codes.join(", ")}` : ""}
              </li>
              <li>Total of unit totals: {formatCurrency(processed.summary.totalAmount)}</li>
              {processed.summary.warnings.map((w) => (
                <li key={w.code} className="text-amber-200">
                  ⚠ {w.message}
                </li>
              ))}
            </ul>
            <a href={processed.url} download={processed.fileName} className="btn-premium btn-premium-primary">
              Download Processed Excel File
            </a>
          </RevealCard>
        </div>
      )}
    </main>
  );
}
