import {
  MAX_UPLOAD_BYTES,
  MAX_UPLOAD_MB,
  PayloadTooLargeError,
  SPREADSHEET_CONTENT_TYPES,
  UnsupportedMediaTypeError,
  ValidationError,
} from "@statement-agents/utils";
import type { ApiContext } from "../context.js";

function isSpreadsheet(contentType: string) {
  return SPREADSHEET_CONTENT_TYPES.some((allowed) => allowed === contentType);
}

export async function uploadFile(request: Request, ctx: ApiContext) {
  let formData: FormData;
  try {
    formData = await request.formData();
  } catch {
    throw new ValidationError("Expected a multipart/form-data body");
  }

  const file = formData.get("file");
  if (!file || typeof file === "string") {
    throw new ValidationError("No file provided");
  }

  if (!isSpreadsheet(file.type)) {
    throw new UnsupportedMediaTypeError("Only CSV or XLSX files are supported.");
  }

  if (file.size > MAX_UPLOAD_BYTES) {
    throw new PayloadTooLargeError(`File exceeds the ${MAX_UPLOAD_MB} MB upload limit`);
  }

  const provider = new URL(request.url).searchParams.get("provider") || null;
  const upload = await ctx.agents.uploadSource(file, provider);
  return Response.json(upload, { status: 201 });
}
