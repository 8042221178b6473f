import fs from "fs";
import type OpenAI from "openai";
import { toFile } from "openai";
import { ExternalServiceError } from "../errors.js";
import type { AudioInput, Transcriber } from "../providers/types.js";

export class OpenAITranscriber implements Transcriber {
  constructor(
    private readonly openai: OpenAI,
    private readonly model: string
  ) {}

  async transcribe(audio: AudioInput): Promise<string> {
    console.log(`[transcribe] ${audio.filename}`);
    try {
      const file = await toFile(fs.createReadStream(audio.filePath), audio.filename);
      const result = await this.openai.audio.transcriptions.create({ model: this.model, file });
      return result.text || "";
    } catch (err) {
      throw new ExternalServiceError("transcribe", err);
    }
  }
}
