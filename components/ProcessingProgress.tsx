"use client";

import { PROCESSING_STAGES, type ProcessingStage } from "@/lib/rent-roll";

interface ProcessingProgressProps {
  /** Current stage, "done" once the output is ready, or null before a run. */
  stage: ProcessingStage | "done" | null;
}

export function ProcessingProgress({ stage }: ProcessingProgressProps) {
  if (stage === null) return null;
  const currentIndex = stage === "done" ? PROCESSING_STAGES.length : PROCESSING_STAGES.findIndex((s) => s.stage === stage);
  const progress = stage === "done" ? 100 : PROCESSING_STAGES[currentIndex]?.progress ?? 0;

  return (
    <div className="mt-5" aria-live="polite">
      <div
        className="h-2 w-full rounded-full bg-white/10 overflow-hidden"
        role="progressbar"
        aria-valuemin={0}
        aria-valuemax={100}
        aria-valuenow={progress}
      >
        <div className="h-full bg-[#3b82f6] transition-all" style={{ width: `${progress}%` }} />
      </div>
      <ol className="mt-3 space-y-1 text-sm">
        {PROCESSING_STAGES.map((s, i) => (
          <li
            key={s.stage}
            className={i < currentIndex ? "text-slate-400" : i === currentIndex ? "text-slate-100 font-medium" : "text-slate-500"}
          >
            {i < currentIndex ? "✓ " : ""}
            {s.label}
          </li>
        ))}
      </ol>
    </div>
  );
}
