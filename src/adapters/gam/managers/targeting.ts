/**
 * Custom targeting: resolve key/value pairs by name and create new values.
 */

import { AdapterError } from "../../../core/errors.js";
import type { CustomTarget } from "../../../types/inventory.js";
import type { GamClientWrapper } from "../client.js";
import { toCustomTarget, toId } from "../mappers.js";
import { buildPqlQuery, whereEquals } from "../pql.js";
import type { GamCustomTargetingKeyRecord } from "../types.js";
import { ADAPTER_TYPE, CUSTOM_TARGETING_KEY_TYPES } from "../utils/constants.js";
import { fetchAllPages } from "../utils/paging.js";

async function findKeys(
  client: GamClientWrapper,
  keyName: string,
  pageSize: number
): Promise<GamCustomTargetingKeyRecord[]> {
  const query = buildPqlQuery({}, whereEquals("name", keyName));
  return fetchAllPages((q) => client.getCustomTargetingKeys(q), query, pageSize);
}

function keyIdOf(key: GamCustomTargetingKeyRecord): number {
  const id = toId(key.id);
  if (id == null) {
    throw new AdapterError("Custom targeting key has no id", ADAPTER_TYPE);
  }
  return Number(id);
}

/** Every value named `valueName` under every key named `keyName`. */
export async function getCustomTargets(
  client: GamClientWrapper,
  keyName: string,
  valueName: string,
  pageSize: number
): Promise<CustomTarget[]> {
  const keys = await findKeys(client, keyName, pageSize);
  const targets: CustomTarget[] = [];

  for (const key of keys) {
    const query = buildPqlQuery({ where: { name: valueName } }, whereEquals("customTargetingKeyId", keyIdOf(key)));
    const values = await fetchAllPages((q) => client.getCustomTargetingValues(q), query, pageSize);
    targets.push(...values.map((value) => toCustomTarget(key, value)));
  }

  return targets;
}

/**
 * Create `value` under the key named `keyName`, creating a FREEFORM key first if
 * the network has none by that name.
 */
export async function createCustomTarget(
  client: GamClientWrapper,
  keyName: string,
  value: string,
  pageSize: number
): Promise<CustomTarget[]> {
  let key = (await findKeys(client, keyName, pageSize))[0];
  if (!key) {
    const created = await client.createCustomTargetingKeys([
      { name: keyName, displayName: keyName, type: CUSTOM_TARGETING_KEY_TYPES.FREEFORM },
    ]);
    key = created[0];
    if (!key) {
      throw new AdapterError(`Custom targeting key ${keyName} was not created`, ADAPTER_TYPE);
    }
  }

  const values = await client.createCustomTargetingValues([
    { customTargetingKeyId: keyIdOf(key), name: value, displayName: value, matchType: "EXACT" },
  ]);
  return values.map((created) => toCustomTarget(key, created));
}
