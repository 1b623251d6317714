import jwt from 'jsonwebtoken';
import { UserRole, type UserRoleType } from '@pressdesk/shared';
import { z } from 'zod';

export interface JWTPayload {
  sub: string;        // user UUID
  email: string;
  role: UserRoleType;
  macId: string | null;
  iat: number;
  exp: number;
}

const PayloadSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  role: UserRole,
  macId: z.string().nullable().default(null),
  iat: z.number(),
  exp: z.number(),
});

export function signToken(payload: Omit<JWTPayload, 'iat' | 'exp'>, secret: string): string {
  return jwt.sign(payload, secret, { expiresIn: '8h' });
}

/** Throws on a bad signature, an expired token, or a payload of the wrong shape. */
export function verifyToken(token: string, secret: string): JWTPayload {
  const decoded = jwt.verify(token, secret);
  return PayloadSchema.parse(decoded);
}
