import { isNewerId } from "../utils/ids.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface QuotaSnapshot {
  dailyPostCount: number;
  maxDailyPosts: number;
  countWindowStart: string;
  lastMentionCursor: string | null;
  lastDmCursor: string | null;
}

interface CursorItem {
  id: string;
}

/**
 * 일일 포스팅 한도 + 멘션/DM 커서
 *
 * In memory only: a fresh tracker starts with a zero counter and null cursors,
 * so items seen before a restart are fetched again.
 */
export class QuotaCursorTracker {
  private readonly now: () => Date;
  private maxDailyPosts: number;
  private dailyPostCount = 0;
  private countWindowStart: Date;
  private mentionCursor: string | null = null;
  private dmCursor: string | null = null;

  constructor(options: { maxDailyPosts: number; now?: () => Date }) {
    this.now = options.now ?? (() => new Date());
    this.maxDailyPosts = Math.max(0, Math.floor(options.maxDailyPosts));
    this.countWindowStart = this.now();
  }

  // 24시간 지났으면 카운터 리셋 (마지막 리셋 기준)
  private resetWindowIfElapsed(): void {
    const current = this.now();
    if (current.getTime() - this.countWindowStart.getTime() >= DAY_MS) {
      this.dailyPostCount = 0;
      this.countWindowStart = current;
    }
  }

  shouldPostNow(): boolean {
    this.resetWindowIfElapsed();
    return this.dailyPostCount < this.maxDailyPosts;
  }

  recordPost(): void {
    this.dailyPostCount += 1;
  }

  setMaxDailyPosts(max: number): void {
    this.maxDailyPosts = Math.max(0, Math.floor(max));
  }

  get lastMentionCursor(): string | null {
    return this.mentionCursor;
  }

  get lastDmCursor(): string | null {
    return this.dmCursor;
  }

  /**
   * Moves the mention cursor to `batch[0].id` (batches arrive newest first).
   * Returns whether the cursor changed.
   */
  advanceMentionCursor(batch: readonly CursorItem[]): boolean {
    if (batch.length === 0) return false;
    const head = batch[0].id;
    if (!isNewerId(head, this.mentionCursor)) return false;
    this.mentionCursor = head;
    return true;
  }

  advanceDmCursor(batch: readonly CursorItem[]): boolean {
    if (batch.length === 0) return false;
    const head = batch[0].id;
    if (!isNewerId(head, this.dmCursor)) return false;
    this.dmCursor = head;
    return true;
  }

  snapshot(): QuotaSnapshot {
    return {
      dailyPostCount: this.dailyPostCount,
      maxDailyPosts: this.maxDailyPosts,
      countWindowStart: this.countWindowStart.toISOString(),
      lastMentionCursor: this.mentionCursor,
      lastDmCursor: this.dmCursor,
    };
  }
}
