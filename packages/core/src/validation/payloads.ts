/**
 * Wire Payload Validation
 *
 * Zod schemas for the snake_case payloads exchanged between the bot and the
 * sync gateway, and their conversion into domain inputs. Every failure is
 * raised as a ValidationError naming the offending field.
 */

import { z } from 'zod';
import { isObject } from '@adsync/utils';
import { ValidationError } from '../errors/index.js';
import { USER_ROLES, type UserRole } from '../types/user.js';
import {
  AD_SOURCE_TYPES,
  AD_STATUSES,
  type AdAuthor,
  type AdContent,
} from '../types/ad.js';

// ============================================
// Field schemas
// ============================================

function blankToNull(value: unknown): unknown {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : Number(trimmed);
  }
  return value;
}

const requiredId = (field: string) => z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value.trim()) : value),
  z.number({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be an integer`,
  })
    .int(`${field} must be an integer`)
    .positive(`${field} must be positive`),
);

const optionalInt = (field: string) => z.preprocess(
  blankToNull,
  z.number({ invalid_type_error: `${field} must be an integer` })
    .int(`${field} must be an integer`)
    .nullable(),
);

const text = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? '' : String(value)));

const trimmedText = text.transform((value) => value.trim());

const requiredText = (field: string) => trimmedText.refine(
  (value) => value.length > 0,
  { message: `${field} is required` },
);

/** Unparseable timestamps become null rather than failing the payload. */
const isoDate = z
  .union([z.string(), z.date()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined || value === '') return null;
    const parsed = value instanceof Date ? value : new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  });

const roleSchema = z.enum(USER_ROLES, {
  errorMap: () => ({ message: `role must be one of: ${USER_ROLES.join(', ')}` }),
});

const statusSchema = z.enum(AD_STATUSES, {
  errorMap: () => ({ message: `status must be one of: ${AD_STATUSES.join(', ')}` }),
});

const sourceTypeSchema = z.enum(AD_SOURCE_TYPES, {
  errorMap: () => ({ message: `source_type must be one of: ${AD_SOURCE_TYPES.join(', ')}` }),
});

const priceSchema = z.preprocess(
  (value) => {
    const normalized = blankToNull(value);
    return normalized === null ? 0 : normalized;
  },
  z.number({ invalid_type_error: 'price must be an integer' })
    .int('price must be an integer')
    .nonnegative('price must not be negative'),
);

const adKeySchema = z.preprocess(
  (value) => (typeof value === 'number' ? String(value) : value),
  z.string({
    required_error: 'ad_id is required',
    invalid_type_error: 'ad_id must be a string',
  })
    .trim()
    .min(1, 'ad_id is required')
    .max(128, 'ad_id must be at most 128 characters'),
);

// ============================================
// Payload schemas
// ============================================

export const userPayloadSchema = z.object({
  telegram_id: requiredId('telegram_id'),
  username: text,
  first_name: text,
  last_name: text,
  language_code: text,
  phone_number: text,
  avatar_file_id: text,
  role: roleSchema.nullish(),
  is_authenticated: z.boolean().nullish().transform((value) => value ?? false),
  authenticated_at: isoDate,
});

export const actionPayloadSchema = z.object({
  telegram_id: requiredId('telegram_id'),
  username: text,
  first_name: text,
  last_name: text,
  action: requiredText('action'),
  details: text,
  timestamp: isoDate,
});

const authorSchema = z.object({
  id: optionalInt('author.id'),
  username: text,
  first_name: text,
  last_name: text,
});

export const adPayloadSchema = z.object({
  ad_id: adKeySchema,
  source_type: sourceTypeSchema.nullish(),
  external_id: text,
  title: requiredText('title'),
  category: trimmedText,
  price: priceSchema,
  year: optionalInt('year'),
  details: text,
  location: text,
  image: text,
  status: statusSchema.nullish(),
  created_at: isoDate,
  author: authorSchema.nullish(),
});

export const actorSchema = z.object({
  actor_telegram_id: requiredId('actor_telegram_id'),
  actor_role: z.string({
    required_error: 'actor_role is required',
    invalid_type_error: 'actor_role must be a string',
  }),
});

// ============================================
// Domain inputs
// ============================================

export interface UserInput {
  telegramId: number;
  username: string;
  firstName: string;
  lastName: string;
  languageCode: string;
  phoneNumber: string;
  avatarFileId: string;
  /** Undefined when the payload carried no role. */
  role: UserRole | undefined;
  isAuthenticated: boolean;
  authenticatedAt: Date | null;
}

export interface ActionInput {
  telegramId: number;
  username: string;
  firstName: string;
  lastName: string;
  action: string;
  details: string;
  timestamp: Date | null;
  rawPayload: Record<string, unknown>;
}

export interface AdInput {
  adId: string;
  content: AdContent;
  author: AdAuthor;
  rawPayload: Record<string, unknown>;
}

/**
 * Identity and role the requester declares. The role is left as a raw
 * string so an unrecognized value reaches the permission evaluator, which
 * fails closed.
 */
export interface Actor {
  telegramId: number;
  role: string;
}

// ============================================
// Parsers
// ============================================

/**
 * Run a schema and convert the first zod issue into a ValidationError.
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, payload: unknown): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'payload';
    throw new ValidationError(field, issue?.message ?? 'invalid payload');
  }
  return result.data;
}

function requireObject(payload: unknown): Record<string, unknown> {
  if (!isObject(payload)) {
    throw new ValidationError('payload', 'must be a JSON object');
  }
  return payload;
}

export function parseUserPayload(payload: unknown): UserInput {
  const data = parseWith(userPayloadSchema, requireObject(payload));
  return {
    telegramId: data.telegram_id,
    username: data.username,
    firstName: data.first_name,
    lastName: data.last_name,
    languageCode: data.language_code,
    phoneNumber: data.phone_number,
    avatarFileId: data.avatar_file_id,
    role: data.role ?? undefined,
    isAuthenticated: data.is_authenticated,
    authenticatedAt: data.authenticated_at,
  };
}

export function parseRole(value: unknown): UserRole {
  return parseField('role', roleSchema, value);
}

export function parseActionPayload(payload: unknown): ActionInput {
  const raw = requireObject(payload);
  const data = parseWith(actionPayloadSchema, raw);
  return {
    telegramId: data.telegram_id,
    username: data.username,
    firstName: data.first_name,
    lastName: data.last_name,
    action: data.action,
    details: data.details,
    timestamp: data.timestamp,
    rawPayload: raw,
  };
}

/**
 * Read the ad key the way the bot sends it: `id` first, `ad_id` as fallback.
 */
function pickAdKey(raw: Record<string, unknown>): unknown {
  const id = raw['id'];
  if (id !== undefined && id !== null && String(id).trim() !== '') return id;
  return raw['ad_id'];
}

export function parseAdPayload(payload: unknown): AdInput {
  const raw = requireObject(payload);
  const data = parseWith(adPayloadSchema, {
    ...raw,
    ad_id: pickAdKey(raw),
    created_at: raw['createdAt'] ?? raw['created_at'],
  });

  return {
    adId: data.ad_id,
    content: {
      sourceType: data.source_type ?? 'manual',
      externalId: data.external_id,
      title: data.title,
      category: data.category,
      price: data.price,
      year: data.year,
      details: data.details,
      location: data.location,
      image: data.image,
      status: data.status ?? 'active',
      createdAtRemote: data.created_at,
    },
    author: {
      telegramId: data.author?.id ?? null,
      username: data.author?.username ?? '',
      firstName: data.author?.first_name ?? '',
      lastName: data.author?.last_name ?? '',
    },
    rawPayload: raw,
  };
}

export function parseActor(payload: unknown): Actor {
  const data = parseWith(actorSchema, requireObject(payload));
  return {
    telegramId: data.actor_telegram_id,
    role: data.actor_role.trim(),
  };
}

/**
 * Split the declared actor off a request body. The remaining fields are the
 * entity payload.
 */
export function splitActor(payload: unknown): { actor: Actor; body: Record<string, unknown> } {
  const { actor_telegram_id, actor_role, ...body } = requireObject(payload);
  return {
    actor: parseActor({ actor_telegram_id, actor_role }),
    body,
  };
}

export function parseTelegramId(value: unknown): number {
  return parseField('telegram_id', requiredId('telegram_id'), value);
}

export function parseAdKey(payload: unknown): string {
  const raw = requireObject(payload);
  const value = raw['ad_id'] ?? raw['id'];
  return parseField('ad_id', adKeySchema, value);
}

// ============================================
// Partial updates
// ============================================

export type AdContentPatch = Partial<AdContent>;

function parseField<S extends z.ZodTypeAny>(field: string, schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(field, result.error.issues[0]?.message ?? 'invalid value');
  }
  return result.data;
}

/**
 * Clean a partial update. Only keys present in `updates` are considered,
 * author fields are dropped because ownership is immutable, and the result
 * must change at least one field.
 */
export function parseAdUpdates(updates: unknown): AdContentPatch {
  if (!isObject(updates)) {
    throw new ValidationError('updates', 'must be an object');
  }

  const patch: AdContentPatch = {};

  if ('title' in updates) {
    patch.title = parseField('title', requiredText('title'), updates['title']);
  }
  if ('category' in updates) {
    patch.category = parseField('category', trimmedText, updates['category']);
  }
  if ('price' in updates) {
    patch.price = parseField('price', priceSchema, updates['price']);
  }
  if ('year' in updates) {
    patch.year = parseField('year', optionalInt('year'), updates['year']);
  }
  if ('details' in updates) {
    patch.details = parseField('details', text, updates['details']);
  }
  if ('location' in updates) {
    patch.location = parseField('location', text, updates['location']);
  }
  if ('image' in updates) {
    patch.image = parseField('image', text, updates['image']);
  }
  if ('status' in updates) {
    patch.status = parseField('status', statusSchema, updates['status']);
  }
  if ('external_id' in updates) {
    patch.externalId = parseField('external_id', text, updates['external_id']);
  }
  if ('source_type' in updates) {
    patch.sourceType = parseField('source_type', sourceTypeSchema, updates['source_type']);
  }
  if ('createdAt' in updates || 'created_at' in updates) {
    patch.createdAtRemote = parseField('created_at', isoDate, updates['createdAt'] ?? updates['created_at']);
  }

  if (Object.keys(patch).length === 0) {
    throw new ValidationError('updates', 'no updatable fields');
  }
  return patch;
}
