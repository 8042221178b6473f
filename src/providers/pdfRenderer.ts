import fs from "fs";
import PDFDocument from "pdfkit";
import type { DocumentKind } from "../minutes/draftStore.js";
import type { Draft } from "../minutes/types.js";
import type { DocumentRenderer } from "./types.js";

const MARGINS = { top: 36, bottom: 36, left: 72, right: 72 };
const TITLE_SIZE = 14;
const HEADING_SIZE = 12;
const BODY_SIZE = 11;

const CHECKLIST: Array<[string, string[]]> = [
  [
    "Definition of Ready",
    [
      "Requirements document is complete",
      "User stories are clearly defined",
      "Technical constraints are shared",
      "Design system / guidelines are set up",
    ],
  ],
  [
    "Design handoff",
    [
      "Screen flow diagram",
      "Wireframes for every screen",
      "UI component specification",
      "Interaction / animation definitions",
      "Responsive behaviour specification",
      "Accessibility (WCAG AA equivalent)",
    ],
  ],
  [
    "Definition of Done",
    [
      "Design review complete",
      "Final stakeholder sign-off",
      "Assets (images, icons) shared",
      "Latest design files merged",
      "Engineering handover notes complete",
    ],
  ],
];

/**
 * pdfkit renderer for the approved minutes and the design checklist.
 * Set PDF_FONT_PATH to a CJK-capable TTF/OTF when minutes are not Latin.
 */
export class PdfDocumentRenderer implements DocumentRenderer {
  constructor(private readonly fontPath?: string) {}

  render(kind: DocumentKind, draft: Draft, outPath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const doc = new PDFDocument({ size: "A4", margins: MARGINS });
      // a missing font throws here, before the output file is opened
      if (this.fontPath) doc.font(this.fontPath);

      const out = fs.createWriteStream(outPath);
      out.on("finish", () => resolve(outPath));
      out.on("error", reject);
      doc.on("error", reject);
      doc.pipe(out);

      try {
        if (kind === "minutes") this.drawMinutes(doc, draft);
        else this.drawChecklist(doc, draft);
      } catch (err) {
        out.destroy();
        reject(err);
        return;
      }

      doc.end();
    });
  }

  private drawMinutes(doc: PDFKit.PDFDocument, draft: Draft): void {
    doc.fontSize(TITLE_SIZE).text(`Minutes: ${draft.title || draft.meetingName || "(untitled)"}`);
    doc.moveDown();
    doc.fontSize(BODY_SIZE);
    for (const [label, value] of [
      ["Meeting", draft.meetingName],
      ["Date", draft.datetimeLabel],
      ["Participants", draft.participants],
      ["Purpose", draft.purpose],
    ]) {
      doc.text(`${label}: ${value || "-"}`);
    }
    for (const [label, value] of [
      ["Summary", draft.summary],
      ["Decisions", draft.decisions],
      ["Actions", draft.actions],
      ["Open issues", draft.issues],
      ["Risks", draft.risks],
    ]) {
      doc.moveDown();
      doc.fontSize(HEADING_SIZE).text(`${label}:`);
      doc.fontSize(BODY_SIZE).text(value || "-", { indent: 18 });
    }
  }

  private drawChecklist(doc: PDFKit.PDFDocument, draft: Draft): void {
    doc.fontSize(TITLE_SIZE + 2).text("Design checklist");
    doc.moveDown(0.5);
    doc.fontSize(BODY_SIZE);
    doc.text(`Meeting: ${draft.meetingName || draft.title || "-"}`);
    doc.text(`Date: ${draft.datetimeLabel || "-"}`);
    doc.text(`Purpose: ${draft.purpose || "-"}`);

    for (const [heading, items] of CHECKLIST) {
      doc.moveDown();
      doc.fontSize(HEADING_SIZE + 1).text(`■ ${heading}`);
      doc.fontSize(BODY_SIZE);
      for (const item of items) doc.text(`[ ] ${item}`, { indent: 12 });
    }

    doc.moveDown();
    for (const role of ["Designer", "Engineer", "PM"]) {
      doc.text(`${role} signature: _________________________`);
    }
  }
}
