import type { UserRepository } from "../../../persistence/user.repository.js";
import type { UserRecord } from "../../../persistence/schemas.js";
import type { CommandInvocation } from "../command.types.js";

export type RegisteredLmsUser = UserRecord & { lmsId: number };

/**
 * Directory record of the sender with a usable LMS id, or null after replying
 * with the reason
 */
export async function requireLmsUser(
  invocation: CommandInvocation,
  users: Pick<UserRepository, "getByChatId">,
): Promise<RegisteredLmsUser | null> {
  const user = await users.getByChatId(invocation.sender.id);
  if (!user) {
    await invocation.reply("❌ You are not registered in the directory.");
    return null;
  }

  const { lmsId } = user;
  if (lmsId === undefined) {
    await invocation.reply("❌ Your record has no valid LMS id.");
    return null;
  }
  return { ...user, lmsId };
}

/** Positive integer question id, or null */
export function parseQuestionId(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
