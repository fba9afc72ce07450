/**
 * Telegram Bot Handlers
 *
 * Every handled update is recorded as a user action. Failures the local
 * side rejects (validation, permissions, missing ads) are answered in chat;
 * anything else propagates to bot.catch.
 */

import { Keyboard, type Bot, type Context } from 'grammy';
import { AdSyncError, canManageAds, type UserRole } from '@adsync/core';
import { isArray, isObject, type Logger } from '@adsync/utils';
import { webAppCommandSchema, type BotServices } from '../services/index.js';

export interface HandlerDeps {
  services: BotServices;
  webAppUrl: string | undefined;
  /** Download a Telegram file by its `file_path`. */
  downloadFile: (filePath: string) => Promise<string>;
  logger: Logger;
}

function mainKeyboard(webAppUrl: string | undefined): Keyboard {
  const keyboard = new Keyboard().requestContact('📱 Share phone number');
  if (webAppUrl) {
    keyboard.row().webApp('🛒 Open ads', webAppUrl);
  }
  return keyboard.resized();
}

function describeRole(role: UserRole): string {
  if (!canManageAds(role)) {
    return 'You can publish ads.';
  }
  return role === 'admin' ? 'You can edit and delete any ad.' : 'You can edit and delete your own ads.';
}

async function replyWithFailure(ctx: Context, error: unknown): Promise<void> {
  if (error instanceof AdSyncError) {
    await ctx.reply(`❌ ${error.message}`);
    return;
  }
  throw error;
}

/**
 * A feed is either a bare list of ads or `{ items: [...] }`.
 */
export function feedItems(document: unknown): unknown {
  if (isObject(document) && 'items' in document) {
    return document['items'];
  }
  return document;
}

export function registerCommands(bot: Bot, deps: HandlerDeps): void {
  const { services, webAppUrl, logger } = deps;

  // /start - Welcome message
  bot.command('start', async (ctx) => {
    if (!ctx.from) return;
    await services.actions.record(ctx.from, 'start');

    await ctx.reply(
      'Welcome! Share your phone number to sign in, then open the ads catalogue.',
      { reply_markup: mainKeyboard(webAppUrl) },
    );
  });

  // /role - What the user may do
  bot.command('role', async (ctx) => {
    if (!ctx.from) return;
    const role = await services.registry.currentRole(ctx.from.id);
    await services.actions.record(ctx.from, 'role');

    await ctx.reply(`Your role: ${role}\n${describeRole(role)}`);
  });

  // Contact shared - register the user
  bot.on('message:contact', async (ctx) => {
    const from = ctx.from;
    if (!from) return;

    const contact = ctx.message.contact;
    if (contact.user_id !== from.id) {
      await ctx.reply('Please share your own contact.');
      return;
    }

    const { entity, created } = await services.registry.register(from, contact.phone_number);
    await services.actions.record(from, created ? 'register' : 'login', contact.phone_number);

    logger.info({ telegramId: entity.telegramId, role: entity.role, created }, 'User authenticated');
    await ctx.reply(
      `✅ Signed in as ${entity.role}.`,
      { reply_markup: mainKeyboard(webAppUrl) },
    );
  });

  // Web app data - ad mutations
  bot.on('message:web_app_data', async (ctx) => {
    const from = ctx.from;
    if (!from) return;

    const raw = ctx.message.web_app_data.data;

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      await ctx.reply('❌ The web app sent malformed data.');
      return;
    }

    const parsed = webAppCommandSchema.safeParse(data);
    if (!parsed.success) {
      await ctx.reply('❌ Unknown web app command.');
      return;
    }

    await services.actions.record(from, parsed.data.action, raw);
    try {
      await ctx.reply(`✅ ${await services.ads.run(from, parsed.data)}`);
    } catch (error) {
      await replyWithFailure(ctx, error);
    }
  });

  // Document captioned /import - admin feed import
  bot.on('message:document', async (ctx) => {
    const from = ctx.from;
    if (!from || ctx.message.caption?.trim() !== '/import') return;

    if (!services.registry.isAdmin(from.id)) {
      await ctx.reply('⛔ Only admins can import ads.');
      return;
    }

    const file = await ctx.getFile();
    if (!file.file_path) {
      await ctx.reply('❌ Telegram did not return the file.');
      return;
    }

    let items: unknown;
    try {
      items = feedItems(JSON.parse(await deps.downloadFile(file.file_path)));
    } catch (error) {
      logger.warn({ err: error }, 'Import file unreadable');
      await ctx.reply('❌ The file is not valid JSON.');
      return;
    }

    await services.actions.record(
      from,
      'import_ads',
      `${ctx.message.document.file_name ?? file.file_id}: ${isArray(items) ? items.length : 0} items`,
    );

    try {
      const result = await services.ads.importFeed(from, items);
      const failures = result.outcomes
        .flatMap((outcome) => (outcome.ok ? [] : [`#${outcome.index}: ${outcome.message}`]))
        .slice(0, 10);

      await ctx.reply(
        [
          `📥 Import finished: ${result.created} created, ${result.updated} updated, ${result.failed} failed.`,
          ...failures,
        ].join('\n'),
      );
    } catch (error) {
      await replyWithFailure(ctx, error);
    }
  });
}
