/**
 * Command: runledger experiments
 *
 * Usage:
 *   runledger experiments --url=file:./runledger.db --view=ALL
 */
import { Effect } from "effect";
import { isViewType } from "@runledger/core";
import { openStore } from "@runledger/db";
import { parseKV, requireArg, strArg } from "../parse.js";
import { runCommand } from "../run.js";

export async function experimentsCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const url = requireArg(kv, "url", "RUNLEDGER_DATABASE_URL");
  const view = strArg(kv, "view", "ACTIVE_ONLY").toUpperCase();
  if (!isViewType(view)) {
    throw new Error(`Unknown view type: ${view}. Expected ACTIVE_ONLY, DELETED_ONLY or ALL.`);
  }

  const experiments = await runCommand(
    Effect.acquireUseRelease(
      openStore({ url, artifactRoot: kv["artifactRoot"] }),
      (store) => store.listExperiments(view),
      (store) => store.close(),
    ),
  );

  console.log(["ID", "NAME", "STAGE", "ARTIFACT LOCATION"].join("\t"));
  for (const e of experiments) {
    console.log([e.experimentId, e.name, e.lifecycleStage, e.artifactLocation].join("\t"));
  }
}
