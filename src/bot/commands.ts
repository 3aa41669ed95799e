import type { BotCommandSpec } from "../telegram/botApi";

export type ParsedCommand = {
  command: string;
  /** Set when addressed as /command@botname. */
  botName: string | null;
  parameters: string;
};

const COMMAND_LINE = /^\/([a-zA-Z0-9_]+)(@([a-zA-Z0-9_]+))?( (.*))?$/;
const STICKER_SET_LINK = /^https:\/\/t\.me\/addstickers\/([a-zA-Z0-9_]+)$/;
const STICKER_SET_NAME = /^([a-zA-Z0-9_]+)$/;

export const BOT_COMMANDS: BotCommandSpec[] = [
  { command: "help", description: "Provides help on available commands" },
  { command: "set", description: "Set user preferences" },
  { command: "start", description: "Introduction to the capabilities of this bot" },
  { command: "stickerset", description: "Download a given sticker set" }
];

/** Every line of a message may carry its own command. */
export function parseCommands(text: string): ParsedCommand[] {
  const commands: ParsedCommand[] = [];
  for (const line of text.split("\n")) {
    const match = COMMAND_LINE.exec(line.trimEnd());
    if (!match) continue;
    commands.push({
      command: match[1].toLowerCase(),
      botName: match[3] ?? null,
      parameters: (match[5] ?? "").trim()
    });
  }
  return commands;
}

export function isAddressedTo(command: ParsedCommand, botName: string): boolean {
  return command.botName === null || command.botName.toLowerCase() === botName.toLowerCase();
}

/** Accepts a bare set name or a t.me/addstickers share link. */
export function parseStickerSetName(parameters: string): string | null {
  const link = STICKER_SET_LINK.exec(parameters);
  if (link) return link[1];
  const bare = STICKER_SET_NAME.exec(parameters);
  return bare ? bare[1] : null;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function renderHelpText(firstName: string) {
  return [
    `Hi, ${firstName}. I understand the following commands:`,
    "",
    "/help - Provides help on available commands.",
    "/set - Set some personal preferences for bot behavior.",
    "/start - Introduction to the capabilities of this bot.",
    "/stickerset - Download a given sticker set."
  ].join("\n");
}

export function renderStartText(firstName: string) {
  return [
    `Hi, ${firstName}.`,
    "",
    "Send /stickerset with a sticker set name or its share link, or forward a sticker right after /stickerset, and you will get the whole set as a ZIP file.",
    "",
    "Use /set to change how sets are delivered and /help for details."
  ].join("\n");
}

const COMMAND_HELP: Record<string, string> = {
  help: [
    "Command:",
    "/help [command]",
    "Purpose:",
    "- To provide additional help on the command [command].",
    "Result:",
    "- Help on the command."
  ].join("\n"),
  set: [
    "Command:",
    "/set [parameter] [value]",
    "Purpose:",
    "- To set personal preferences for bot behavior, or to show them.",
    "Parameters:",
    "- provide_sticker_set: always, once or never",
    "- greedy: yes or no (download the set of every sticker you forward)",
    "- silent: yes or no (skip progress notices)",
    "- Just /set shows the current preferences.",
    "Result:",
    "- The desired bot behavior moving forward."
  ].join("\n"),
  start: ["Command:", "/start", "Purpose:", "- To introduce you to the features of this bot."].join("\n"),
  stickerset: [
    "Command:",
    "/stickerset",
    "Purpose:",
    "- To download an entire sticker set.",
    "Parameters:",
    "(1) a share link such as https://t.me/addstickers/name",
    "(2) the name of the set",
    "(3) nothing, followed by a forwarded sticker from the set",
    "Result:",
    "- A ZIP file with all stickers in the set."
  ].join("\n")
};

export function renderCommandHelp(command: string, firstName: string): string {
  return COMMAND_HELP[command] ?? `Sorry, ${firstName}, I cannot provide you with any help on "${escapeHtml(command)}".`;
}
