import { google, type drive_v3 } from "googleapis";
import { z } from "zod";
import { ConfigError } from "../errors.js";

const serviceAccountSchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
});

const SCOPES = ["https://www.googleapis.com/auth/drive"];

export interface ServiceAccountSettings {
  serviceAccountJson: string;
  serviceAccountPath: string;
}

export function hasServiceAccount(settings: ServiceAccountSettings): boolean {
  return Boolean(settings.serviceAccountJson || settings.serviceAccountPath);
}

/** Drive v3 client authenticated as a service account (inline JSON wins over a key file). */
export function createDriveClient(settings: ServiceAccountSettings): drive_v3.Drive {
  let auth;
  if (settings.serviceAccountJson) {
    let json: unknown;
    try {
      json = JSON.parse(settings.serviceAccountJson);
    } catch {
      throw new ConfigError("GOOGLE_SERVICE_ACCOUNT_JSON is not valid JSON");
    }
    const parsed = serviceAccountSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigError("GOOGLE_SERVICE_ACCOUNT_JSON needs client_email and private_key");
    }
    const { client_email, private_key } = parsed.data;
    auth = new google.auth.GoogleAuth({ credentials: { client_email, private_key }, scopes: SCOPES });
  } else if (settings.serviceAccountPath) {
    auth = new google.auth.GoogleAuth({ keyFile: settings.serviceAccountPath, scopes: SCOPES });
  } else {
    throw new ConfigError("Google Drive needs GOOGLE_SERVICE_ACCOUNT_JSON or GOOGLE_SERVICE_ACCOUNT_PATH");
  }
  return google.drive({ version: "v3", auth });
}
