import { requireSetting, type AppConfig } from "../config";
import type { RateDestination } from "../uploader";
import { createDuneDestination } from "./dune";
import { createPostgresDestination } from "./postgres";

export function createDestination(config: AppConfig): RateDestination {
  switch (config.destination) {
    case "dune":
      return createDuneDestination({
        apiKey: requireSetting(config.dune.apiKey, "DUNE_API_KEY"),
        namespace: requireSetting(config.dune.namespace, "DUNE_NAMESPACE"),
        tableName: config.dune.tableName,
      });
    case "postgres":
      return createPostgresDestination();
  }
}
