import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_ROLE_HIERARCHY, ROLE } from '../../constants/user.constants';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

const roleHierarchySchema = z
  .record(z.string().min(1), z.number().int().positive())
  .superRefine((table, ctx) => {
    for (const role of Object.values(ROLE)) {
      if (!(role in table)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `rank for role '${role}' is required`, path: [role] });
      }
    }
  });

/**
 * Rank table override from ROLE_HIERARCHY (JSON object of role -> rank).
 * Every built-in role needs a rank; extra roles are allowed.
 * Falls back to the built-in table when unset.
 */
export const parseRoleHierarchy = (raw: string | undefined): Record<string, number> => {
  if (!raw || raw.trim() === '') {
    return { ...DEFAULT_ROLE_HIERARCHY };
  }
  return roleHierarchySchema.parse(JSON.parse(raw));
};

const nodeEnv = process.env.NODE_ENV || 'development';

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '3000'),
  nodeEnv,
  jwtSecret: process.env.JWT_SECRET || 'secret',
  jwtExpiresIn: parseInt(process.env.JWT_EXPIRES_IN || '86400'), // seconds
  jwtRefreshExpiresIn: parseInt(process.env.JWT_REFRESH_EXPIRES_IN || '2592000'), // seconds, 30 days
  bcryptRounds: parseInt(process.env.BCRYPT_ROUNDS || '10'),
  corsOrigins: parseCorsOrigins(),
};

export const logConfig = {
  level: process.env.LOG_LEVEL || 'info',
  dir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  rotation: process.env.LOG_ROTATION || '10MB',
  retention: process.env.LOG_RETENTION || '30d',
  compression: true,
  // Console only and muted while Jest runs
  silent: nodeEnv === 'test',
};

export const roleConfig = {
  hierarchy: parseRoleHierarchy(process.env.ROLE_HIERARCHY),
};
