import { randomUUID } from "crypto";
import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { StorageError } from "../utils/errors";

export interface ImageUpload {
  bytes: Buffer;
  /** Folder inside the bucket, e.g. `lost_reports`. */
  folder: string;
  filename?: string;
  contentType?: string;
}

export interface ObjectStore {
  /** Stores the image and returns its public URL. */
  putImage(upload: ImageUpload): Promise<string>;
  removeImage(url: string): Promise<void>;
}

export const fileExtension = (filename: string | undefined): string => {
  const parts = (filename ?? "").split(".").filter(Boolean);
  if (parts.length < 2) return "jpg";
  const ext = parts[parts.length - 1].toLowerCase();
  return /^[a-z0-9]{1,8}$/.test(ext) ? ext : "jpg";
};

/** Path of an object inside the bucket, recovered from its public URL. */
export const objectPathFromUrl = (url: string, bucket: string): string | null => {
  const marker = `/${bucket}/`;
  const index = url.indexOf(marker);
  if (index === -1) return null;
  const path = url.slice(index + marker.length).split("?")[0];
  return path ? decodeURIComponent(path) : null;
};

export class SupabaseObjectStore implements ObjectStore {
  private readonly client: SupabaseClient;

  constructor(url: string, key: string, private readonly bucket: string) {
    this.client = createClient(url, key, { auth: { persistSession: false } });
  }

  async putImage(upload: ImageUpload): Promise<string> {
    const path = `${upload.folder}/${randomUUID()}.${fileExtension(upload.filename)}`;
    const { data, error } = await this.client.storage.from(this.bucket).upload(path, upload.bytes, {
      contentType: upload.contentType || "application/octet-stream",
      cacheControl: "3600",
      upsert: false,
    });
    if (error) {
      console.error("Supabase upload error:", error);
      throw new StorageError(`Failed to upload image: ${error.message}`);
    }

    const { data: publicUrlData } = this.client.storage.from(this.bucket).getPublicUrl(data.path);
    return publicUrlData.publicUrl;
  }

  async removeImage(url: string): Promise<void> {
    const path = objectPathFromUrl(url, this.bucket);
    if (!path) {
      throw new StorageError(`Not an object of bucket ${this.bucket}: ${url}`);
    }
    const { error } = await this.client.storage.from(this.bucket).remove([path]);
    if (error) {
      throw new StorageError(`Failed to remove image: ${error.message}`);
    }
  }
}
