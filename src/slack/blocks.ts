import type { Button, InputBlock, KnownBlock, PlainTextInput, SectionBlock, View } from "@slack/web-api";

/*
 * Message content is built as a small transport-neutral tree and rendered
 * per target: Slack Block Kit for messages and modals, plain text for
 * notification fallbacks and mail bodies.
 */

export interface ButtonNode {
  type: "button";
  label: string;
  actionId: string;
  value: string;
  style?: "primary" | "danger";
  disabled?: boolean;
}

export interface HeaderNode {
  type: "header";
  text: string;
}

export interface SectionNode {
  type: "section";
  /** mrkdwn */
  text?: string;
  /** mrkdwn, rendered as a two-column grid */
  fields?: string[];
  accessory?: ButtonNode;
}

export interface DividerNode {
  type: "divider";
}

export interface ActionsNode {
  type: "actions";
  buttons: ButtonNode[];
}

export interface InputNode {
  type: "input";
  blockId: string;
  label: string;
  initialValue: string;
  multiline: boolean;
}

export type BlockNode = HeaderNode | SectionNode | DividerNode | ActionsNode | InputNode;

export interface ModalNode {
  callbackId: string;
  privateMetadata: string;
  title: string;
  submitLabel: string;
  closeLabel: string;
  inputs: InputNode[];
}

/** Every modal input uses this action id; values are keyed by block id. */
export const INPUT_ACTION_ID = "inp";

const SECTION_TEXT_LIMIT = 3000;
const FIELD_TEXT_LIMIT = 2000;
const HEADER_TEXT_LIMIT = 150;
const MODAL_TITLE_LIMIT = 24;

function clip(text: string, limit: number): string {
  return text.length > limit ? text.slice(0, limit - 1) + "…" : text;
}

function renderButton(node: ButtonNode): Button {
  const button: Button = {
    type: "button",
    text: { type: "plain_text", text: node.label },
    action_id: node.actionId,
    value: node.value,
  };
  if (node.style) button.style = node.style;
  return button;
}

function renderInput(node: InputNode): InputBlock {
  const element: PlainTextInput = {
    type: "plain_text_input",
    action_id: INPUT_ACTION_ID,
    multiline: node.multiline,
  };
  if (node.initialValue) element.initial_value = node.initialValue;
  return {
    type: "input",
    block_id: node.blockId,
    optional: true,
    label: { type: "plain_text", text: node.label },
    element,
  };
}

function renderSection(node: SectionNode): SectionBlock {
  const block: SectionBlock = { type: "section" };
  if (node.text !== undefined) {
    block.text = { type: "mrkdwn", text: clip(node.text || "-", SECTION_TEXT_LIMIT) };
  }
  if (node.fields && node.fields.length > 0) {
    block.fields = node.fields.map((f) => ({ type: "mrkdwn", text: clip(f, FIELD_TEXT_LIMIT) }));
  }
  // Block Kit buttons cannot be greyed out; a disabled control is dropped
  if (node.accessory && !node.accessory.disabled) {
    block.accessory = renderButton(node.accessory);
  }
  return block;
}

function renderBlock(node: BlockNode): KnownBlock {
  switch (node.type) {
    case "header":
      return { type: "header", text: { type: "plain_text", text: clip(node.text, HEADER_TEXT_LIMIT) } };
    case "divider":
      return { type: "divider" };
    case "actions":
      return {
        type: "actions",
        elements: node.buttons.filter((b) => !b.disabled).map(renderButton),
      };
    case "input":
      return renderInput(node);
    case "section":
      return renderSection(node);
  }
}

export function renderSlackBlocks(nodes: BlockNode[]): KnownBlock[] {
  return nodes
    .filter((n) => !(n.type === "actions" && n.buttons.every((b) => b.disabled)))
    .map(renderBlock);
}

export function renderSlackModal(modal: ModalNode): View {
  return {
    type: "modal",
    callback_id: modal.callbackId,
    private_metadata: modal.privateMetadata,
    title: { type: "plain_text", text: clip(modal.title, MODAL_TITLE_LIMIT) },
    submit: { type: "plain_text", text: modal.submitLabel },
    close: { type: "plain_text", text: modal.closeLabel },
    blocks: modal.inputs.map(renderInput),
  };
}

/** Plain-text rendering for message fallbacks, mail bodies and logs. */
export function renderPlainText(nodes: BlockNode[]): string {
  const lines: string[] = [];
  for (const node of nodes) {
    switch (node.type) {
      case "header":
        lines.push(node.text);
        break;
      case "divider":
        lines.push("----");
        break;
      case "section":
        if (node.text !== undefined) lines.push(stripMrkdwn(node.text || "-"));
        for (const field of node.fields ?? []) lines.push(stripMrkdwn(field).replace(/\n/g, " "));
        break;
      case "input":
        lines.push(`${node.label}: ${node.initialValue}`);
        break;
      case "actions":
        break;
    }
  }
  return lines.join("\n");
}

function stripMrkdwn(text: string): string {
  return text.replace(/(^|\s)[*_~]+|[*_~]+(?=\s|$)/g, "$1");
}
