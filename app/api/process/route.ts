import { ACCEPTED_EXTENSION, MAX_UPLOAD_BYTES, MAX_UPLOAD_MB, XLSX_MIME } from "@/lib/config";
import { processRentRoll } from "@/lib/rent-roll";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

function contentDisposition(fileName: string): string {
  const ascii = fileName.replace(/[^\x20-\x7e]/g, "_").replace(/["\\]/g, "_");
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

/**
 * Server-side processing: multipart upload with a "file" field (.xlsx) → processed workbook.
 * POST /api/process
 * 400 bad upload, 413 too large, 422 structure not recognised.
 */
export async function POST(req: Request) {
  const rid = req.headers.get("x-request-id") ?? crypto.randomUUID();

  let form: FormData;
  try {
    form = await req.formData();
  } catch {
    return Response.json({ error: "Expected a multipart/form-data upload with a file field." }, { status: 400 });
  }

  const file = form.get("file");
  if (file === null || typeof file === "string") {
    return Response.json({ error: "Missing file field." }, { status: 400 });
  }
  if (!file.name.toLowerCase().endsWith(ACCEPTED_EXTENSION)) {
    return Response.json({ error: "Only .xlsx files are accepted." }, { status: 400 });
  }
  if (file.size > MAX_UPLOAD_BYTES) {
    return Response.json({ error: `File is larger than ${MAX_UPLOAD_MB} MB.` }, { status: 413 });
  }

  console.log("[process] start", { rid, file: file.name, size: file.size });
  try {
    const result = await processRentRoll(await file.arrayBuffer(), file.name);
    if (!result.ok) {
      return Response.json({ error: result.error }, { status: 422 });
    }
    return new Response(result.buffer, {
      status: 200,
      headers: {
        "content-type": XLSX_MIME,
        "content-disposition": contentDisposition(result.fileName),
        "cache-control": "no-store",
        "x-request-id": rid,
      },
    });
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error("[process] error", { rid, file: file.name, msg });
    return Response.json({ error: "Processing failed." }, { status: 500 });
  }
}
