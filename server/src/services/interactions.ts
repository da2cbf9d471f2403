import type { AnalysisRecord, Feedback, InteractionRecord } from '../domain/types.js';

/**
 * In-memory, append-only history of analyses per user.
 * Created once at startup and handed to the bot; nothing is persisted, a restart clears it.
 */
export class InteractionLog {
  private readonly interactions: InteractionRecord[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  record(userId: number, phrase: string, analysis: AnalysisRecord | null = null): InteractionRecord {
    const interaction: InteractionRecord = {
      userId,
      phrase,
      analysis,
      timestamp: this.now(),
    };
    this.interactions.push(interaction);
    return interaction;
  }

  getUserInteractions(userId: number): InteractionRecord[] {
    return this.interactions.filter((interaction) => interaction.userId === userId);
  }

  getLatest(userId: number): InteractionRecord | undefined {
    for (let i = this.interactions.length - 1; i >= 0; i--) {
      const interaction = this.interactions[i];
      if (interaction.userId === userId) {
        return interaction;
      }
    }
    return undefined;
  }

  /**
   * Attaches feedback to the user's most recent interaction
   * @returns false when the user has no interactions yet
   */
  addFeedback(userId: number, feedback: Feedback): boolean {
    const latest = this.getLatest(userId);
    if (!latest) {
      return false;
    }
    latest.feedback = feedback;
    return true;
  }

  get size(): number {
    return this.interactions.length;
  }
}
