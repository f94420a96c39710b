/**
 * Chat identity helpers.
 *
 * Identities look like `@localpart:server`. Bare localparts are qualified
 * with the configured server name.
 */

export interface NormalizedIdentity {
  chatId: string;
  localpart: string;
}

export function localpart(chatId: string): string {
  const [head = ""] = chatId.split(":", 1);
  return head.replace(/^@/, "");
}

export function normalizeIdentifier(
  raw: string,
  serverName: string,
): NormalizedIdentity | null {
  const data = raw.trim();
  if (!data) return null;

  if (data.startsWith("@")) {
    const separator = data.indexOf(":");
    const local = (separator === -1 ? data : data.slice(0, separator)).replace(/^@+/, "");
    const domain = separator === -1 ? serverName : data.slice(separator + 1);
    if (!local || !domain) return null;
    return { chatId: `@${local}:${domain}`, localpart: local };
  }

  return { chatId: `@${data}:${serverName}`, localpart: data };
}
