import fs from "fs";
import path from "path";
import type { drive_v3 } from "googleapis";
import type { CloudStorage, UploadedFile } from "./types.js";

/** Uploads approved documents into a Drive folder (shared drives included). */
export class DriveStorage implements CloudStorage {
  constructor(
    private readonly drive: drive_v3.Drive,
    private readonly folderId: string
  ) {}

  async upload(filePath: string, mimeType: string): Promise<UploadedFile> {
    const name = path.basename(filePath);
    console.log(`[drive] Uploading ${name} to ${this.folderId || "root"}`);
    const resp = await this.drive.files.create({
      requestBody: {
        name,
        ...(this.folderId ? { parents: [this.folderId] } : {}),
      },
      media: { mimeType, body: fs.createReadStream(filePath) },
      fields: "id, webViewLink",
      supportsAllDrives: true,
    });
    const id = resp.data.id;
    if (!id) throw new Error("Drive upload returned no file id");
    return { id, webViewLink: resp.data.webViewLink ?? null };
  }
}
