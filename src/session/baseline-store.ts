/**
 * セッションごとのベースライン（baseLtv / baseCac）保持
 *
 * LTV・CAC計算のたびに上書きし、シナリオ計算に明示的に渡す。
 * 永続化はしない（プロセス再起動で消える）
 */

import { v4 as uuidv4, validate as uuidValidate } from "uuid";
import { SESSION } from "../constants";
import { logger } from "../logger";
import { SessionBaseline, assertNonNegative } from "../metrics-engine";

export interface SessionBaselineStoreOptions {
  /** 最終アクセスからこの分数を過ぎたセッションは破棄 */
  ttlMinutes?: number;
  /** 保持するセッションの上限（超えたら最も古いものから破棄） */
  maxEntries?: number;
  /** 現在時刻（テスト用） */
  now?: () => number;
}

export interface SessionContext {
  sessionId: string;
  baseline: SessionBaseline;
}

interface SessionEntry {
  baseline: SessionBaseline;
  lastAccessedAt: number;
}

const EMPTY_BASELINE: SessionBaseline = { baseLtv: 0, baseCac: 0 };

export class SessionBaselineStore {
  private readonly entries = new Map<string, SessionEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: SessionBaselineStoreOptions = {}) {
    this.ttlMs = (options.ttlMinutes ?? SESSION.DEFAULT_TTL_MINUTES) * 60 * 1000;
    this.maxEntries = options.maxEntries ?? SESSION.DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * セッションを取得、なければ新規作成
   *
   * 不正な形式・期限切れ・未知のIDは新しいIDで作り直す
   */
  getOrCreate(sessionId?: string): SessionContext {
    this.evictExpired();

    if (sessionId && uuidValidate(sessionId)) {
      const entry = this.entries.get(sessionId);
      if (entry) {
        this.touch(sessionId, entry);
        return { sessionId, baseline: { ...entry.baseline } };
      }
    }

    const newId = uuidv4();
    this.insert(newId, { ...EMPTY_BASELINE });
    logger.debug("Session created", { sessionId: newId });
    return { sessionId: newId, baseline: { ...EMPTY_BASELINE } };
  }

  /**
   * ベースラインを上書き
   *
   * sessionId が無効な場合は新しいセッションに書き込む
   *
   * @throws {InvalidInputError} 負数・非有限値を書き込もうとした場合
   */
  update(sessionId: string | undefined, patch: Partial<SessionBaseline>): SessionContext {
    if (patch.baseLtv !== undefined) assertNonNegative("baseLtv", patch.baseLtv);
    if (patch.baseCac !== undefined) assertNonNegative("baseCac", patch.baseCac);

    const current = this.getOrCreate(sessionId);
    const baseline: SessionBaseline = { ...current.baseline, ...patch };
    this.insert(current.sessionId, baseline);
    return { sessionId: current.sessionId, baseline: { ...baseline } };
  }

  private touch(sessionId: string, entry: SessionEntry): void {
    // Mapの挿入順を最終アクセス順として使う
    this.entries.delete(sessionId);
    this.entries.set(sessionId, { ...entry, lastAccessedAt: this.now() });
  }

  private insert(sessionId: string, baseline: SessionBaseline): void {
    this.entries.delete(sessionId);
    this.entries.set(sessionId, { baseline, lastAccessedAt: this.now() });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  private evictExpired(): void {
    const threshold = this.now() - this.ttlMs;
    for (const [id, entry] of this.entries) {
      if (entry.lastAccessedAt >= threshold) {
        // 以降は新しいエントリのみ
        break;
      }
      this.entries.delete(id);
    }
  }
}
