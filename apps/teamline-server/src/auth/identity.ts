import jwt, { type JwtPayload } from "jsonwebtoken";
import type { Identity } from "@teamline/protocol";
import { errorMessage } from "../errors.js";

export interface IdentityVerifier {
  /** Resolves null for any token that does not identify a user */
  verify(token: string): Promise<Identity | null>;
}

/** Verifies HS256 bearer tokens issued by the auth service (`sub` is the user id). */
export class JwtIdentityVerifier implements IdentityVerifier {
  constructor(private readonly secret: string) {}

  async verify(token: string): Promise<Identity | null> {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, { algorithms: ["HS256"] });
    } catch (err) {
      console.warn("[auth] Token verification failed:", errorMessage(err));
      return null;
    }

    if (typeof payload === "string" || typeof payload.sub !== "string" || !payload.sub) {
      return null;
    }

    const email: unknown = payload.email;
    return typeof email === "string" ? { id: payload.sub, email } : { id: payload.sub };
  }
}

/** Sign a token the way the auth service does; used by tools and tests. */
export function signToken(secret: string, userId: string, email?: string): string {
  return jwt.sign(email ? { email } : {}, secret, { algorithm: "HS256", subject: userId, expiresIn: "1h" });
}
