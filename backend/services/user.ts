import type { AppConfig } from '../config';
import type { DocumentStore } from '../db';
import { modelFromDict, type ModelRecord } from '../schema';

const MODELS_COLLECTION = 'models';
const CACHE_BUST_MAX = 1000000;

export type ModelLookup =
  | { kind: 'found'; model: ModelRecord }
  | { kind: 'not_found' }
  | { kind: 'error'; error: unknown };

/*
  What a chat function hands back: an instruction for the model's reply
  and an HTML fragment appended to the chat bubble ('' when there is none).
*/
export interface FunctionResult {
  reply: string;
  html: string;
}

export interface UserServiceOptions {
  // Returns a float in [0, 1), like Math.random
  random?: () => number;
}

function logError(error: unknown): void {
  if (error instanceof Error) {
    console.error(`${error.stack ?? error.name}, ${error.message}`);
  } else {
    console.error(error);
  }
}

export class UserService {
  private readonly random: () => number;

  constructor(
    private readonly db: DocumentStore,
    private readonly config: AppConfig,
    options: UserServiceOptions = {}
  ) {
    this.random = options.random ?? Math.random;
  }

  get defaultUserId(): string {
    return this.config.DEFAULT_USER_ID;
  }

  async findModel(userId: string): Promise<ModelLookup> {
    try {
      const results = await this.db.findWhere(MODELS_COLLECTION, 'user_id', userId);

      if (results.length === 0) {
        console.warn(`No character found for '${userId}'.`);
        return { kind: 'not_found' };
      }

      // Only one model per user is expected; the first row wins
      return { kind: 'found', model: modelFromDict(results[0].data) };
    } catch (error) {
      logError(error);
      return { kind: 'error', error };
    }
  }

  /*
    Nullable lookup: "not found" and "lookup failed" both yield null.
    Use findModel when the caller needs to tell them apart.
  */
  async getModel(userId: string): Promise<ModelRecord | null> {
    const lookup = await this.findModel(userId);
    return lookup.kind === 'found' ? lookup.model : null;
  }

  async fcSaveModelColor(userId: string, color: string): Promise<FunctionResult> {
    return this.updateFirstModel(
      userId,
      { color, original_material: false },
      `Updated color to '${color}' for '${userId}''s model.`,
      'Reply that their character color has been updated'
    );
  }

  async fcRevertModelColor(userId: string): Promise<FunctionResult> {
    return this.updateFirstModel(
      userId,
      { original_material: true },
      `Reverted to original materials for '${userId}''s model.`,
      'Reply that their character colors have been reverted'
    );
  }

  fcShowMyModel(userId: string): FunctionResult {
    console.info(`Showing user's (${userId}) character`);
    return {
      reply: 'Reply something like "there you go"',
      html: '<script>document.querySelector("#modelWindow")?.removeAttribute("hidden");</script>',
    };
  }

  fcShowMyAvatar(userId: string): FunctionResult {
    console.info(`Showing user's (${userId}) avatar`);
    return {
      reply: 'Reply something like "There you go."',
      html: `<div><br><img class="avatar" src="${this.avatarUrl(userId)}"></div>`,
    };
  }

  avatarUrl(userId: string): string {
    const rand = Math.floor(this.random() * (CACHE_BUST_MAX + 1));
    return `/static/avatars/${encodeURIComponent(userId)}.png?rand=${rand}`;
  }

  private async updateFirstModel(
    userId: string,
    patch: Record<string, unknown>,
    logMessage: string,
    successReply: string
  ): Promise<FunctionResult> {
    try {
      const results = await this.db.findWhere(MODELS_COLLECTION, 'user_id', userId);

      if (results.length === 0) {
        return { reply: `Reply that no character for user '${userId}' was found.`, html: '' };
      }

      await this.db.update(MODELS_COLLECTION, results[0].id, patch);
      console.info(logMessage);

      return { reply: successReply, html: '<script>window.reloadCurrentModel?.();</script>' };
    } catch (error) {
      logError(error);
      return { reply: 'Reply that we failed to update their character settings.', html: '' };
    }
  }
}
