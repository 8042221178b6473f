import fs from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import { DraftExistsError, NotFoundError } from "../errors.js";
import { normalizeDraft, type Draft } from "./types.js";

export type DocumentKind = "minutes" | "design_checklist";

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

export function newDraftId(): string {
  return randomUUID().replace(/-/g, "");
}

export interface DraftStore {
  create(id: string, draft: Draft): Promise<void>;
  read(id: string): Promise<Draft>;
  update(id: string, draft: Draft): Promise<void>;
  exists(id: string): Promise<boolean>;
}

function assertSafeId(id: string): void {
  if (!SAFE_ID.test(id)) throw new NotFoundError("Draft", id);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * One JSON file per draft under `<dataDir>/summaries`. Writes go through a
 * temp file and rename, so a crash never leaves a half-written draft.
 */
export class FileDraftStore implements DraftStore {
  readonly summariesDir: string;
  readonly transcriptsDir: string;
  readonly documentsDir: string;
  readonly uploadsDir: string;

  constructor(readonly dataDir: string) {
    this.summariesDir = path.join(dataDir, "summaries");
    this.transcriptsDir = path.join(dataDir, "transcripts");
    this.documentsDir = path.join(dataDir, "documents");
    this.uploadsDir = path.join(dataDir, "uploads");
  }

  async init(): Promise<void> {
    for (const dir of [this.summariesDir, this.transcriptsDir, this.documentsDir, this.uploadsDir]) {
      await fs.mkdir(dir, { recursive: true });
    }
  }

  private draftPath(id: string): string {
    assertSafeId(id);
    return path.join(this.summariesDir, `${id}.json`);
  }

  private async writeAtomic(filePath: string, contents: string | Buffer, flag?: "wx"): Promise<void> {
    const tmp = `${filePath}.${randomUUID().slice(0, 8)}.tmp`;
    await fs.writeFile(tmp, contents);
    if (flag === "wx") {
      // link() fails with EEXIST instead of overwriting
      try {
        await fs.link(tmp, filePath);
      } finally {
        await fs.rm(tmp, { force: true });
      }
      return;
    }
    await fs.rename(tmp, filePath);
  }

  async exists(id: string): Promise<boolean> {
    if (!SAFE_ID.test(id)) return false;
    try {
      await fs.access(this.draftPath(id));
      return true;
    } catch {
      return false;
    }
  }

  async create(id: string, draft: Draft): Promise<void> {
    const filePath = this.draftPath(id);
    try {
      await this.writeAtomic(filePath, JSON.stringify(draft, null, 2), "wx");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") {
        throw new DraftExistsError(id);
      }
      throw err;
    }
    console.log(`[store] Created draft ${id}`);
  }

  async read(id: string): Promise<Draft> {
    let raw: string;
    try {
      raw = await fs.readFile(this.draftPath(id), "utf-8");
    } catch (err) {
      if (isMissing(err)) throw new NotFoundError("Draft", id);
      throw err;
    }
    return normalizeDraft(JSON.parse(raw));
  }

  async update(id: string, draft: Draft): Promise<void> {
    if (!(await this.exists(id))) throw new NotFoundError("Draft", id);
    await this.writeAtomic(this.draftPath(id), JSON.stringify(draft, null, 2));
    console.log(`[store] Updated draft ${id}`);
  }

  async saveTranscript(id: string, text: string): Promise<string> {
    assertSafeId(id);
    const filePath = path.join(this.transcriptsDir, `${id}.txt`);
    await this.writeAtomic(filePath, text);
    return filePath;
  }

  async saveUpload(id: string, ext: string, bytes: Buffer): Promise<string> {
    assertSafeId(id);
    const safeExt = /^\.[A-Za-z0-9]{1,8}$/.test(ext) ? ext : ".webm";
    const filePath = path.join(this.uploadsDir, `${id}${safeExt}`);
    await this.writeAtomic(filePath, bytes);
    return filePath;
  }

  documentPath(id: string, kind: DocumentKind): string {
    assertSafeId(id);
    return path.join(this.documentsDir, `${id}_${kind}.pdf`);
  }
}
