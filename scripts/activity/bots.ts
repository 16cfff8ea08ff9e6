const BOT_SUFFIXES = ["[bot]", "bot"];

/** A login is a bot when it ends with "bot" or "[bot]", case-insensitively. */
export function isBotLogin(login: string | null | undefined): boolean {
  if (!login) {
    return false;
  }

  const normalized = login.toLowerCase();
  return BOT_SUFFIXES.some((suffix) => normalized.endsWith(suffix));
}

export function withoutBotAuthors<T extends { authorLogin: string | null }>(records: readonly T[]): T[] {
  return records.filter((record) => !isBotLogin(record.authorLogin));
}
