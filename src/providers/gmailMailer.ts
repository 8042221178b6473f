import nodemailer, { type Transporter } from "nodemailer";
import type { MailAttachment, Mailer } from "./types.js";

export interface GmailSettings {
  user: string;
  pass: string;
  to: string;
}

/** Gmail SMTP over TLS (port 465) with an app password. */
export class GmailMailer implements Mailer {
  private readonly transport: Transporter;

  constructor(private readonly settings: GmailSettings) {
    this.transport = nodemailer.createTransport({
      host: "smtp.gmail.com",
      port: 465,
      secure: true,
      auth: { user: settings.user, pass: settings.pass },
    });
  }

  async send(params: { subject: string; body: string; attachments: MailAttachment[] }): Promise<void> {
    await this.transport.sendMail({
      from: this.settings.user,
      to: this.settings.to,
      subject: params.subject,
      text: params.body,
      attachments: params.attachments.map((a) => ({ filename: a.filename, path: a.path })),
    });
    console.log(`[mail] Sent "${params.subject}" to ${this.settings.to}`);
  }
}
