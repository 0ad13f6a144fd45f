import { HIERARCHY_ENTITY_TYPES, type HierarchyEntityType } from "../../../core/constants.js";
import { ValidationError } from "../../../core/errors.js";
import type { HierarchyRecord, PageRequest } from "../../../types/inventory.js";
import type { GamClientWrapper } from "../client.js";
import { adUnitToHierarchy, keyToHierarchy, valueToHierarchy } from "../mappers.js";
import { buildPqlQuery } from "../pql.js";

/** One page of ad units or custom targeting keys/values, flattened for tree building. */
export async function getHierarchyPage(
  client: GamClientWrapper,
  entityType: HierarchyEntityType,
  page: PageRequest
): Promise<HierarchyRecord[]> {
  const query = buildPqlQuery({ limit: page.limit, offset: page.offset });

  switch (entityType) {
    case HIERARCHY_ENTITY_TYPES.AD_UNIT: {
      const result = await client.getAdUnits(query);
      return (result.results ?? []).map(adUnitToHierarchy);
    }
    case HIERARCHY_ENTITY_TYPES.CUSTOM_TARGETING_KEY: {
      const result = await client.getCustomTargetingKeys(query);
      return (result.results ?? []).map(keyToHierarchy);
    }
    case HIERARCHY_ENTITY_TYPES.CUSTOM_TARGETING_VALUE: {
      const result = await client.getCustomTargetingValues(query);
      return (result.results ?? []).map(valueToHierarchy);
    }
    default:
      throw new ValidationError(`Unsupported hierarchy entity type: ${String(entityType)}`);
  }
}
