const TOKEN_IN_PATH = /\/bot\d+:[A-Za-z0-9_-]+/g;

/** Masks the bot token in API and file-download URLs before they reach a log line. */
export function redactBotToken(text: string): string {
  return text.replace(TOKEN_IN_PATH, "/bot[redacted]");
}
