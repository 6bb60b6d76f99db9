import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

import type {
  MutationResult,
  QueryOptions,
  QueryResult,
  RecordMetadata,
  RecordStore,
  RecordValue,
} from "@/lib/booking/types";

export const RECORDS_TABLE = "booking_records";

const DEFAULT_QUERY_LIMIT = 50;

const metadataSchema = z.record(
  z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])
);

const rowSchema = z.object({ metadata: metadataSchema });

// --- Supabase ---

/**
 * Records live in one table keyed by (namespace, key) with a jsonb
 * `metadata` column. Queries are exact-match containment on metadata.
 */
export function createSupabaseRecordStore(
  supabase: SupabaseClient,
  table: string = RECORDS_TABLE
): RecordStore {
  return {
    async upsert(namespace, key, metadata): Promise<MutationResult> {
      try {
        const { error } = await supabase
          .from(table)
          .upsert(
            { namespace, key, metadata, updated_at: new Date().toISOString() },
            { onConflict: "namespace,key" }
          );

        if (error) {
          console.error("[record-store] upsert error:", error);
          return { success: false, error: error.message };
        }

        return { success: true };
      } catch (err) {
        console.error("[record-store] upsert error:", err);
        return { success: false, error: String(err) };
      }
    },

    async query(namespace, filter, options: QueryOptions = {}): Promise<QueryResult> {
      const { limit = DEFAULT_QUERY_LIMIT, offset = 0, orderBy } = options;

      try {
        let query = supabase
          .from(table)
          .select("metadata")
          .eq("namespace", namespace)
          .contains("metadata", filter);

        query = orderBy
          ? query.order(`metadata->>${orderBy}`, { ascending: true })
          : query.order("key", { ascending: true });

        const { data, error } = await query.range(offset, offset + limit - 1);

        if (error) {
          console.error("[record-store] query error:", error);
          return { success: false, error: error.message };
        }

        const records: RecordMetadata[] = [];
        for (const row of data ?? []) {
          const parsed = rowSchema.safeParse(row);
          if (!parsed.success) {
            console.warn(`[record-store] skipping malformed row in ${namespace}`);
            continue;
          }
          records.push(parsed.data.metadata);
        }

        return { success: true, records };
      } catch (err) {
        console.error("[record-store] query error:", err);
        return { success: false, error: String(err) };
      }
    },
  };
}

// --- In-memory ---

function sameValue(a: RecordValue | undefined, b: RecordValue): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

function copyMetadata(metadata: RecordMetadata): RecordMetadata {
  const copy: RecordMetadata = {};
  for (const [field, value] of Object.entries(metadata)) {
    copy[field] = Array.isArray(value) ? [...value] : value;
  }
  return copy;
}

export function createMemoryRecordStore(): RecordStore {
  const namespaces = new Map<string, Map<string, RecordMetadata>>();

  return {
    async upsert(namespace, key, metadata) {
      let records = namespaces.get(namespace);
      if (!records) {
        records = new Map();
        namespaces.set(namespace, records);
      }
      records.set(key, copyMetadata(metadata));
      return { success: true };
    },

    async query(namespace, filter, options: QueryOptions = {}) {
      const { limit = DEFAULT_QUERY_LIMIT, offset = 0, orderBy } = options;

      const matches = [...(namespaces.get(namespace)?.values() ?? [])].filter((metadata) =>
        Object.entries(filter).every(([field, value]) => sameValue(metadata[field], value))
      );
      if (orderBy) {
        matches.sort((a, b) => {
          const left = String(a[orderBy] ?? "");
          const right = String(b[orderBy] ?? "");
          return left < right ? -1 : left > right ? 1 : 0;
        });
      }
      const records = matches.slice(offset, offset + limit).map(copyMetadata);

      return { success: true, records };
    },
  };
}
