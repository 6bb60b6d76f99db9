import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { SupabaseClient } from "@supabase/supabase-js";
import {
  createSupabaseRecordStore,
  createMemoryRecordStore,
  RECORDS_TABLE,
} from "@/services/record-store";

// ── Mock Supabase factory ──

type MockChainable = {
  select: ReturnType<typeof vi.fn>;
  upsert: ReturnType<typeof vi.fn>;
  eq: ReturnType<typeof vi.fn>;
  contains: ReturnType<typeof vi.fn>;
  order: ReturnType<typeof vi.fn>;
  range: ReturnType<typeof vi.fn>;
};

function createChainable(resolvedValue: { data: unknown; error: unknown }): MockChainable {
  const chainable: MockChainable = {
    select: vi.fn(),
    upsert: vi.fn().mockResolvedValue(resolvedValue),
    eq: vi.fn(),
    contains: vi.fn(),
    order: vi.fn(),
    range: vi.fn().mockResolvedValue(resolvedValue),
  };
  chainable.select.mockReturnValue(chainable);
  chainable.eq.mockReturnValue(chainable);
  chainable.contains.mockReturnValue(chainable);
  chainable.order.mockReturnValue(chainable);
  return chainable;
}

function createMockSupabase(chainable: MockChainable) {
  const from = vi.fn().mockReturnValue(chainable);
  // Only `from` is exercised by the record store.
  return { client: { from } as unknown as SupabaseClient, from };
}

describe("supabase record store", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-08-10T04:30:00Z"));
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("upserts on (namespace, key)", async () => {
    const chainable = createChainable({ data: null, error: null });
    const { client, from } = createMockSupabase(chainable);

    const result = await createSupabaseRecordStore(client).upsert("users", "user-asha@example.com", {
      type: "user",
      user_id: "asha@example.com",
    });

    expect(result).toEqual({ success: true });
    expect(from).toHaveBeenCalledWith(RECORDS_TABLE);
    expect(chainable.upsert).toHaveBeenCalledWith(
      {
        namespace: "users",
        key: "user-asha@example.com",
        metadata: { type: "user", user_id: "asha@example.com" },
        updated_at: "2026-08-10T04:30:00.000Z",
      },
      { onConflict: "namespace,key" }
    );
  });

  it("returns the database error message", async () => {
    const chainable = createChainable({ data: null, error: { message: "permission denied" } });
    const { client } = createMockSupabase(chainable);

    const result = await createSupabaseRecordStore(client).upsert("users", "k", { type: "user" });

    expect(result).toEqual({ success: false, error: "permission denied" });
  });

  it("queries by namespace and metadata containment", async () => {
    const chainable = createChainable({
      data: [
        { metadata: { type: "appointment", id: "a1" } },
        { metadata: "garbage" },
      ],
      error: null,
    });
    const { client } = createMockSupabase(chainable);

    const result = await createSupabaseRecordStore(client).query(
      "appointments",
      { type: "appointment", user_id: "asha@example.com" },
      { limit: 10, offset: 20, orderBy: "start_time" }
    );

    expect(chainable.select).toHaveBeenCalledWith("metadata");
    expect(chainable.eq).toHaveBeenCalledWith("namespace", "appointments");
    expect(chainable.contains).toHaveBeenCalledWith("metadata", {
      type: "appointment",
      user_id: "asha@example.com",
    });
    expect(chainable.order).toHaveBeenCalledWith("metadata->>start_time", { ascending: true });
    expect(chainable.range).toHaveBeenCalledWith(20, 29);
    expect(result).toEqual({ success: true, records: [{ type: "appointment", id: "a1" }] });
  });

  it("orders by key and takes the first page by default", async () => {
    const chainable = createChainable({ data: [], error: null });
    const { client } = createMockSupabase(chainable);

    await createSupabaseRecordStore(client).query("users", { type: "user" });

    expect(chainable.order).toHaveBeenCalledWith("key", { ascending: true });
    expect(chainable.range).toHaveBeenCalledWith(0, 49);
  });

  it("catches thrown errors", async () => {
    const chainable = createChainable({ data: null, error: null });
    chainable.range.mockRejectedValue(new Error("fetch failed"));
    const { client } = createMockSupabase(chainable);

    const result = await createSupabaseRecordStore(client).query("users", { type: "user" });

    expect(result).toEqual({ success: false, error: "Error: fetch failed" });
  });
});

describe("memory record store", () => {
  it("matches every filter field exactly", async () => {
    const store = createMemoryRecordStore();
    await store.upsert("users", "user-a", { type: "user", user_id: "a", tags: ["x"] });
    await store.upsert("users", "user-b", { type: "user", user_id: "b" });

    await expect(store.query("users", { type: "user", user_id: "a" })).resolves.toEqual({
      success: true,
      records: [{ type: "user", user_id: "a", tags: ["x"] }],
    });
    await expect(store.query("users", { tags: ["x"] })).resolves.toEqual({
      success: true,
      records: [{ type: "user", user_id: "a", tags: ["x"] }],
    });
  });

  it("replaces a record on the same key and honours the limit", async () => {
    const store = createMemoryRecordStore();
    await store.upsert("appointments", "appt-1", { type: "appointment", status: "confirmed" });
    await store.upsert("appointments", "appt-1", { type: "appointment", status: "cancelled" });
    await store.upsert("appointments", "appt-2", { type: "appointment", status: "confirmed" });

    const result = await store.query("appointments", { type: "appointment" }, { limit: 1 });

    expect(result).toEqual({
      success: true,
      records: [{ type: "appointment", status: "cancelled" }],
    });
  });

  it("sorts by a metadata field and pages with offset", async () => {
    const store = createMemoryRecordStore();
    await store.upsert("appointments", "c", { start_time: "2026-08-19T09:00:00+05:30" });
    await store.upsert("appointments", "a", { start_time: "2026-08-17T09:00:00+05:30" });
    await store.upsert("appointments", "b", { start_time: "2026-08-18T09:00:00+05:30" });

    const result = await store.query(
      "appointments",
      {},
      { orderBy: "start_time", offset: 1, limit: 1 }
    );

    expect(result).toEqual({
      success: true,
      records: [{ start_time: "2026-08-18T09:00:00+05:30" }],
    });
  });

  it("keeps namespaces apart", async () => {
    const store = createMemoryRecordStore();
    await store.upsert("users", "k", { type: "user" });

    await expect(store.query("appointments", {})).resolves.toEqual({ success: true, records: [] });
  });
});
