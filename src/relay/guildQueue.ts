type GuildQueueOptions = {
  onTaskError?: (guildId: string, error: unknown) => void;
};

/**
 * Runs tasks for one guild strictly one after another while different guilds
 * proceed independently. The tail promise per guild never rejects.
 */
export class GuildQueue {
  tails: Map<string, Promise<void>>;
  onTaskError: ((guildId: string, error: unknown) => void) | null;

  constructor({ onTaskError }: GuildQueueOptions = {}) {
    this.tails = new Map();
    this.onTaskError = onTaskError ?? null;
  }

  run(guildId: string, task: () => Promise<void>) {
    const previous = this.tails.get(guildId) ?? Promise.resolve();
    const next = previous.then(task).catch((error: unknown) => {
      this.onTaskError?.(guildId, error);
    });
    this.tails.set(guildId, next);

    return next.finally(() => {
      if (this.tails.get(guildId) === next) {
        this.tails.delete(guildId);
      }
    });
  }
}
