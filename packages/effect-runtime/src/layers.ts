/**
 * Effect layers for dependency injection.
 */
import { Effect, Layer } from "effect";
import { TrackingStoreService } from "@runledger/core";
import { openStore, type OpenStoreDeps, type StoreOptions } from "@runledger/db";

// ── Tracking store ─────────────────────────────────────────────────────────

/** Opens a SQL-backed store for the lifetime of the layer and closes it on release. */
export const TrackingStoreLive = (options: StoreOptions = {}, deps: OpenStoreDeps = {}) =>
  Layer.scoped(
    TrackingStoreService,
    Effect.acquireRelease(openStore(options, deps), (store) => store.close()),
  );
