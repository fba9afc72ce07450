import type { AppendOnlyStore } from '../store/types.js';
import type { UserAction, UserActionInput } from '../types/action.js';
import { parseActionPayload } from '../validation/payloads.js';

/**
 * Appends user actions. The event timestamp from the payload wins over the
 * receive time.
 */
export class ActionService {
  constructor(
    private readonly actions: AppendOnlyStore<UserAction, UserActionInput>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async record(payload: unknown): Promise<UserAction> {
    const input = parseActionPayload(payload);
    return this.actions.append({
      telegramId: input.telegramId,
      username: input.username,
      firstName: input.firstName,
      lastName: input.lastName,
      action: input.action,
      details: input.details,
      createdAt: input.timestamp ?? this.now(),
      rawPayload: input.rawPayload,
    });
  }
}
