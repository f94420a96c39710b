import { z } from "zod";

/**
 * Claims carried by a chat client token. `sub` is the chat identity
 * (`@localpart:server`).
 */
export const TokenClaimsSchema = z.object({
  sub: z.string().regex(/^@[^:\s]+:[^\s]+$/, "sub must be a chat identity"),
  name: z.string().min(1).optional(),
  exp: z.number().optional(),
  iat: z.number().optional(),
});

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;

/**
 * Authenticated chat user attached to a socket
 */
export interface ChatUser {
  id: string;
  displayName: string;
}

export interface AuthSocketData {
  user: ChatUser;
  token: string;
}
