import { SignJWT, errors, jwtVerify } from "jose";
import { err, ok } from "../errors";
import type { AuthError, Result } from "../errors";

export interface Identity {
  subject: string;
  /** Epoch seconds. */
  expiresAt: number;
}

const ALGORITHM = "HS256";
const BEARER_PREFIX = /^Bearer\s+(.+)$/i;

const encodeSecret = (secret: string) => new TextEncoder().encode(secret);

export async function verifyCredential(
  authorization: string | undefined,
  secret: string,
  now: Date = new Date(),
): Promise<Result<Identity, AuthError>> {
  if (!authorization) {
    return err({ kind: "auth.missing", message: "Missing Authorization header" });
  }

  const match = authorization.trim().match(BEARER_PREFIX);
  const token = match?.[1]?.trim();
  if (!token) {
    return err({ kind: "auth.missing", message: "Authorization header must use the Bearer scheme" });
  }

  try {
    const { payload } = await jwtVerify(token, encodeSecret(secret), {
      algorithms: [ALGORITHM],
      requiredClaims: ["sub", "exp"],
      currentDate: now,
    });

    if (typeof payload.sub !== "string" || typeof payload.exp !== "number") {
      return err({ kind: "auth.invalid", message: "Token is missing subject or expiry" });
    }

    return ok({ subject: payload.sub, expiresAt: payload.exp });
  } catch (error) {
    if (error instanceof errors.JWTExpired) {
      return err({ kind: "auth.expired", message: "Token has expired" });
    }
    if (error instanceof errors.JOSEError) {
      return err({ kind: "auth.invalid", message: "Token is invalid" });
    }
    throw error;
  }
}

export const createAccessToken = async (
  secret: string,
  subject: string,
  ttlSeconds: number,
  now: Date = new Date(),
): Promise<string> => {
  const issuedAt = Math.floor(now.getTime() / 1000);

  return new SignJWT({})
    .setProtectedHeader({ alg: ALGORITHM, typ: "JWT" })
    .setSubject(subject)
    .setIssuedAt(issuedAt)
    .setExpirationTime(issuedAt + ttlSeconds)
    .sign(encodeSecret(secret));
};
