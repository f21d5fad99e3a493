"use client";

import { useCallback, useState } from "react";
import { ACCEPTED_EXTENSION, XLSX_MIME } from "@/lib/config";
import { validateUpload } from "@/lib/upload";

interface RentRollUploadProps {
  file: File | null;
  disabled?: boolean;
  onFileSelected: (file: File) => void;
  onError: (message: string) => void;
}

export function RentRollUpload({ file, disabled = false, onFileSelected, onError }: RentRollUploadProps) {
  const [dragOver, setDragOver] = useState(false);

  const acceptFiles = useCallback(
    (incoming: FileList | null | undefined) => {
      const files = Array.from(incoming ?? []);
      if (files.length === 0) return;
      if (files.length > 1) {
        onError("Upload one workbook at a time.");
        return;
      }
      const [selected] = files;
      const problem = validateUpload(selected);
      if (problem) {
        onError(problem);
        return;
      }
      onError("");
      onFileSelected(selected);
    },
    [onError, onFileSelected]
  );

  const onDrop = useCallback(
    (e: React.DragEvent) => {
      e.preventDefault();
      setDragOver(false);
      if (!disabled) acceptFiles(e.dataTransfer.files);
    },
    [acceptFiles, disabled]
  );

  const onDragOver = useCallback((e: React.DragEvent) => {
    e.preventDefault();
    setDragOver(true);
  }, []);

  const onDragLeave = useCallback((e: React.DragEvent) => {
    e.preventDefault();
    setDragOver(false);
  }, []);

  const onFileInput = useCallback(
    (e: React.ChangeEvent<HTMLInputElement>) => {
      acceptFiles(e.target.files);
      e.target.value = "";
    },
    [acceptFiles]
  );

  return (
    <div
      onDrop={onDrop}
      onDragOver={onDragOver}
      onDragLeave={onDragLeave}
      className={`
        border-2 border-dashed rounded-xl p-5 sm:p-8 text-center transition-colors
        ${dragOver ? "border-[#3b82f6]/50 bg-[#3b82f6]/10" : "border-white/20 bg-white/[0.03]"}
        ${disabled ? "pointer-events-none opacity-70" : ""}
      `}
    >
      <p className="text-sm text-zinc-400 mb-2 leading-relaxed">
        Drag and drop a <strong className="text-zinc-300">Rent Roll</strong> or{" "}
        <strong className="text-zinc-300">Affordable Rent Roll</strong> .xlsx export here, or click to choose.
      </p>
      <input
        type="file"
        accept={`${ACCEPTED_EXTENSION},${XLSX_MIME}`}
        onChange={onFileInput}
        disabled={disabled}
        className="hidden"
        id="rent-roll-file-input"
      />
      <label htmlFor="rent-roll-file-input" className="btn-premium btn-premium-primary cursor-pointer">
        Choose file
      </label>
      {file && <p className="mt-3 text-xs text-zinc-400">Uploaded: {file.name}</p>}
    </div>
  );
}
