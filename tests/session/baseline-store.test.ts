/**
 * セッションベースライン保持のテスト
 */

import { validate as uuidValidate } from "uuid";
import { SessionBaselineStore } from "../../src/session";
import { logger } from "../../src/logger";
import { InvalidInputError } from "../../src/errors";

beforeAll(() => {
  logger.setLevel("error");
});

/**
 * 時刻を手動で進められるストアを作成
 */
function createStore(options: { ttlMinutes?: number; maxEntries?: number } = {}) {
  let current = 1_000_000;
  const store = new SessionBaselineStore({
    ...options,
    now: () => current,
  });
  const advanceMinutes = (minutes: number): void => {
    current += minutes * 60 * 1000;
  };
  return { store, advanceMinutes };
}

describe("SessionBaselineStore", () => {
  describe("getOrCreate", () => {
    it("IDなしなら新しいUUIDでベースライン0を作る", () => {
      const { store } = createStore();
      const session = store.getOrCreate();
      expect(uuidValidate(session.sessionId)).toBe(true);
      expect(session.baseline).toEqual({ baseLtv: 0, baseCac: 0 });
      expect(store.size).toBe(1);
    });

    it("既存IDなら同じセッションを返す", () => {
      const { store } = createStore();
      const created = store.update(undefined, { baseLtv: 300 });
      const found = store.getOrCreate(created.sessionId);
      expect(found.sessionId).toBe(created.sessionId);
      expect(found.baseline).toEqual({ baseLtv: 300, baseCac: 0 });
      expect(store.size).toBe(1);
    });

    it("UUIDでないIDは新規セッションに置き換える", () => {
      const { store } = createStore();
      const session = store.getOrCreate("not-a-uuid");
      expect(session.sessionId).not.toBe("not-a-uuid");
      expect(uuidValidate(session.sessionId)).toBe(true);
    });

    it("未知のUUIDも新規セッションになる", () => {
      const { store } = createStore();
      const unknown = "3b241101-e2bb-4255-8caf-4136c566a962";
      expect(store.getOrCreate(unknown).sessionId).not.toBe(unknown);
    });

    it("返したベースラインを変更しても保持値は変わらない", () => {
      const { store } = createStore();
      const session = store.update(undefined, { baseLtv: 100 });
      session.baseline.baseLtv = 999;
      expect(store.getOrCreate(session.sessionId).baseline.baseLtv).toBe(100);
    });
  });

  describe("update", () => {
    it("LTV → CAC の順に上書きする", () => {
      const { store } = createStore();
      const afterLtv = store.update(undefined, { baseLtv: 300 });
      const afterCac = store.update(afterLtv.sessionId, { baseCac: 20 });
      expect(afterCac.sessionId).toBe(afterLtv.sessionId);
      expect(afterCac.baseline).toEqual({ baseLtv: 300, baseCac: 20 });

      const recomputed = store.update(afterLtv.sessionId, { baseLtv: 150 });
      expect(recomputed.baseline).toEqual({ baseLtv: 150, baseCac: 20 });
    });

    it("セッションごとに独立している", () => {
      const { store } = createStore();
      const a = store.update(undefined, { baseLtv: 100 });
      const b = store.update(undefined, { baseLtv: 200 });
      expect(store.getOrCreate(a.sessionId).baseline.baseLtv).toBe(100);
      expect(store.getOrCreate(b.sessionId).baseline.baseLtv).toBe(200);
    });

    it("非有限値・負数は書き込まず、保持値も変えない", () => {
      const { store } = createStore();
      const session = store.update(undefined, { baseLtv: 300, baseCac: 20 });

      expect(() => store.update(session.sessionId, { baseLtv: Number.POSITIVE_INFINITY })).toThrow(InvalidInputError);
      expect(() => store.update(session.sessionId, { baseCac: Number.NaN })).toThrow(InvalidInputError);
      expect(() => store.update(session.sessionId, { baseCac: -1 })).toThrow(InvalidInputError);
      expect(store.getOrCreate(session.sessionId).baseline).toEqual({ baseLtv: 300, baseCac: 20 });
    });
  });

  describe("有効期限と上限", () => {
    it("TTLを過ぎたセッションは破棄される", () => {
      const { store, advanceMinutes } = createStore({ ttlMinutes: 10 });
      const session = store.update(undefined, { baseLtv: 300 });
      advanceMinutes(11);
      const next = store.getOrCreate(session.sessionId);
      expect(next.sessionId).not.toBe(session.sessionId);
      expect(next.baseline).toEqual({ baseLtv: 0, baseCac: 0 });
      expect(store.size).toBe(1);
    });

    it("アクセスするたびに期限が延びる", () => {
      const { store, advanceMinutes } = createStore({ ttlMinutes: 10 });
      const session = store.update(undefined, { baseLtv: 300 });
      advanceMinutes(8);
      store.getOrCreate(session.sessionId);
      advanceMinutes(8);
      expect(store.getOrCreate(session.sessionId).sessionId).toBe(session.sessionId);
    });

    it("上限を超えると最も古いセッションから破棄する", () => {
      const { store } = createStore({ maxEntries: 2 });
      const first = store.update(undefined, { baseLtv: 1 });
      const second = store.update(undefined, { baseLtv: 2 });
      store.update(undefined, { baseLtv: 3 });
      expect(store.size).toBe(2);
      expect(store.getOrCreate(second.sessionId).baseline.baseLtv).toBe(2);
      expect(store.getOrCreate(first.sessionId).sessionId).not.toBe(first.sessionId);
    });
  });
});
