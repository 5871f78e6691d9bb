export interface UploadRecord {
  file_id: string;
  filename: string;
  provider: string | null;
  content_type: string;
  bytes: number;
  uploaded_at: Date;
}

/** What the upload endpoint returns; same shape as the persisted record. */
export type UploadResult = UploadRecord;

/** Anything that looks like a `File` from `request.formData()`. */
export interface UploadSource {
  name: string;
  type: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}
