import type { drive_v3 } from "googleapis";

export interface RemoteFile {
  id: string;
  name: string;
  mimeType: string;
  /** RFC 3339, when Drive reports it. */
  createdTime: string | null;
}

export interface WatchRegistration {
  channelId: string;
  resourceId: string;
  /** Epoch milliseconds. */
  expiration: number;
}

export interface WatchRequest {
  channelId: string;
  address: string;
  token: string;
}

/** The remote folder the watcher ingests from. */
export interface FileStore {
  /** Text and audio files in the folder, newest first. */
  listCandidates(folderId: string, pageSize: number): Promise<RemoteFile[]>;
  download(fileId: string): Promise<Buffer>;
  rename(fileId: string, name: string): Promise<void>;
  watch(folderId: string, request: WatchRequest): Promise<WatchRegistration>;
  stopWatch(channelId: string, resourceId: string): Promise<void>;
}

// Drive expires push channels after a week unless told otherwise
const DEFAULT_CHANNEL_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export class GoogleDriveFileStore implements FileStore {
  constructor(private readonly drive: drive_v3.Drive) {}

  async listCandidates(folderId: string, pageSize: number): Promise<RemoteFile[]> {
    const resp = await this.drive.files.list({
      q: `'${folderId}' in parents and trashed = false and (mimeType = 'text/plain' or mimeType contains 'audio/')`,
      orderBy: "createdTime desc",
      pageSize,
      fields: "files(id, name, mimeType, createdTime)",
      supportsAllDrives: true,
      includeItemsFromAllDrives: true,
    });
    const files: RemoteFile[] = [];
    for (const f of resp.data.files ?? []) {
      if (!f.id || !f.name) continue;
      files.push({ id: f.id, name: f.name, mimeType: f.mimeType ?? "", createdTime: f.createdTime ?? null });
    }
    return files;
  }

  async download(fileId: string): Promise<Buffer> {
    const resp = await this.drive.files.get(
      { fileId, alt: "media", supportsAllDrives: true },
      { responseType: "arraybuffer" }
    );
    const data: unknown = resp.data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (Buffer.isBuffer(data)) return data;
    if (typeof data === "string") return Buffer.from(data, "utf-8");
    throw new Error(`Unexpected download payload for ${fileId}`);
  }

  async rename(fileId: string, name: string): Promise<void> {
    await this.drive.files.update({ fileId, requestBody: { name }, supportsAllDrives: true });
  }

  async watch(folderId: string, request: WatchRequest): Promise<WatchRegistration> {
    const start = await this.drive.changes.getStartPageToken({ supportsAllDrives: true });
    const pageToken = start.data.startPageToken;
    if (!pageToken) throw new Error("Drive returned no start page token");

    const resp = await this.drive.changes.watch({
      pageToken,
      supportsAllDrives: true,
      includeItemsFromAllDrives: true,
      requestBody: {
        id: request.channelId,
        type: "web_hook",
        address: request.address,
        token: request.token || undefined,
      },
    });
    const resourceId = resp.data.resourceId;
    if (!resourceId) throw new Error(`Drive watch for ${folderId} returned no resource id`);
    const expiration = Number(resp.data.expiration);
    return {
      channelId: request.channelId,
      resourceId,
      expiration: Number.isFinite(expiration) && expiration > 0 ? expiration : Date.now() + DEFAULT_CHANNEL_TTL_MS,
    };
  }

  async stopWatch(channelId: string, resourceId: string): Promise<void> {
    await this.drive.channels.stop({ requestBody: { id: channelId, resourceId } });
  }
}
