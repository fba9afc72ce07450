/**
 * Ad Listing Types
 */

export const AD_STATUSES = ['active', 'inactive', 'archived'] as const;
export type AdStatus = (typeof AD_STATUSES)[number];

export const AD_SOURCE_TYPES = ['excel', 'manual'] as const;
export type AdSourceType = (typeof AD_SOURCE_TYPES)[number];

/**
 * Ownership anchor of an ad. Fixed at creation.
 * Excel imports carry no author, hence the nullable id.
 */
export interface AdAuthor {
  telegramId: number | null;
  username: string;
  firstName: string;
  lastName: string;
}

/**
 * Fields an upsert or an update may replace.
 */
export interface AdContent {
  sourceType: AdSourceType;
  externalId: string;
  title: string;
  category: string;
  price: number;
  year: number | null;
  details: string;
  location: string;
  image: string;
  status: AdStatus;
  createdAtRemote: Date | null;
}

export interface AdItem extends AdContent {
  adId: string;

  authorTelegramId: number | null;
  authorUsername: string;
  authorFirstName: string;
  authorLastName: string;

  rawPayload: Record<string, unknown>;

  createdAt: Date;
  updatedAt: Date;
}
