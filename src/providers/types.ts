import type { Draft } from "../minutes/types.js";
import type { DocumentKind } from "../minutes/draftStore.js";

export interface AudioInput {
  filePath: string;
  filename: string;
}

/** Speech to text. */
export interface Transcriber {
  transcribe(audio: AudioInput): Promise<string>;
}

/** Transcript to structured minutes. `title` is left empty; the pipeline owns it. */
export interface Summarizer {
  summarize(transcript: string): Promise<Draft>;
}

export interface DocumentRenderer {
  /** Writes the document to `outPath` and resolves with that path. */
  render(kind: DocumentKind, draft: Draft, outPath: string): Promise<string>;
}

export interface MailAttachment {
  filename: string;
  path: string;
}

export interface Mailer {
  send(params: { subject: string; body: string; attachments: MailAttachment[] }): Promise<void>;
}

export interface UploadedFile {
  id: string;
  webViewLink: string | null;
}

export interface CloudStorage {
  upload(filePath: string, mimeType: string): Promise<UploadedFile>;
}
