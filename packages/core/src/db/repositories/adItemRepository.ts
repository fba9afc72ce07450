/**
 * Ad Item Repository
 *
 * ad_items table. Author columns are written on insert only.
 */

import {
  AD_SOURCE_TYPES,
  AD_STATUSES,
  type AdItem,
  type AdSourceType,
  type AdStatus,
} from '../../types/ad.js';
import type { RemovableStore, UpsertResult } from '../../store/types.js';
import type { DatabaseConnection } from '../client.js';
import {
  BaseRepository,
  fromDateColumn,
  parseJsonColumn,
  toDateColumn,
  type TableMapping,
} from '../baseRepository.js';

type AdItemRow = {
  ad_id: string;
  source_type: string;
  external_id: string;
  title: string;
  category: string;
  price: number;
  year: number | null;
  details: string;
  location: string;
  image: string;
  status: string;
  author_telegram_id: number | null;
  author_username: string;
  author_first_name: string;
  author_last_name: string;
  created_at_remote: string | null;
  raw_payload: string;
  created_at: string;
  updated_at: string;
};

function storedStatus(value: string): AdStatus {
  const status = AD_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unexpected stored status "${value}"`);
  }
  return status;
}

function storedSourceType(value: string): AdSourceType {
  const sourceType = AD_SOURCE_TYPES.find((candidate) => candidate === value);
  if (!sourceType) {
    throw new Error(`Unexpected stored source_type "${value}"`);
  }
  return sourceType;
}

const adItemMapping: TableMapping<AdItem, string, AdItemRow> = {
  model: 'AdItem',
  table: 'ad_items',
  keyColumn: 'ad_id',
  columns: [
    'ad_id',
    'source_type',
    'external_id',
    'title',
    'category',
    'price',
    'year',
    'details',
    'location',
    'image',
    'status',
    'author_telegram_id',
    'author_username',
    'author_first_name',
    'author_last_name',
    'created_at_remote',
    'raw_payload',
    'created_at',
    'updated_at',
  ],
  immutableColumns: [
    'author_telegram_id',
    'author_username',
    'author_first_name',
    'author_last_name',
    'created_at',
  ],
  orderBy: 'created_at DESC, ad_id ASC',
  filterColumns: {
    adId: 'ad_id',
    sourceType: 'source_type',
    category: 'category',
    status: 'status',
    authorTelegramId: 'author_telegram_id',
  },
  keyOf: (ad) => ad.adId,
  toRow: (ad) => ({
    ad_id: ad.adId,
    source_type: ad.sourceType,
    external_id: ad.externalId,
    title: ad.title,
    category: ad.category,
    price: ad.price,
    year: ad.year,
    details: ad.details,
    location: ad.location,
    image: ad.image,
    status: ad.status,
    author_telegram_id: ad.authorTelegramId,
    author_username: ad.authorUsername,
    author_first_name: ad.authorFirstName,
    author_last_name: ad.authorLastName,
    created_at_remote: toDateColumn(ad.createdAtRemote),
    raw_payload: JSON.stringify(ad.rawPayload),
    created_at: ad.createdAt.toISOString(),
    updated_at: ad.updatedAt.toISOString(),
  }),
  fromRow: (row) => ({
    adId: row.ad_id,
    sourceType: storedSourceType(row.source_type),
    externalId: row.external_id,
    title: row.title,
    category: row.category,
    price: row.price,
    year: row.year,
    details: row.details,
    location: row.location,
    image: row.image,
    status: storedStatus(row.status),
    authorTelegramId: row.author_telegram_id,
    authorUsername: row.author_username,
    authorFirstName: row.author_first_name,
    authorLastName: row.author_last_name,
    createdAtRemote: fromDateColumn(row.created_at_remote),
    rawPayload: parseJsonColumn(row.raw_payload),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  }),
};

export class AdItemRepository
  extends BaseRepository<AdItem, string, AdItemRow>
  implements RemovableStore<AdItem, string>
{
  constructor(db: DatabaseConnection) {
    super(db, adItemMapping);
  }

  upsert(ad: AdItem): Promise<UpsertResult<AdItem>> {
    return this.upsertRow(ad);
  }

  remove(adId: string): Promise<boolean> {
    return this.deleteRow(adId);
  }
}
