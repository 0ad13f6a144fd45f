/**
 * PQL query building. Filter keys are provider column names passed through as-is;
 * every value is bound, never spliced into the query text.
 */

import { ValidationError } from "../../core/errors.js";
import type { QueryOptions } from "../../types/inventory.js";
import type { PqlQuery, PqlValue } from "./types.js";

export const DEFAULT_ORDER = "id ASC";

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_.]*$/;
const NUMERIC_ID_RE = /^\d+$/;

export interface PqlCondition {
  where: string;
  values: Record<string, PqlValue>;
}

/** GAM ids are numeric; anything else is a malformed request. */
export function toPqlId(id: string): number {
  if (!NUMERIC_ID_RE.test(id)) {
    throw new ValidationError(`Invalid GAM id: ${id}`);
  }
  return Number(id);
}

/** Equality condition on one column, bound under the column's own name. */
export function whereEquals(column: string, value: PqlValue): PqlCondition {
  const bind = column.replace(/\./g, "_");
  return { where: `${column} = :${bind}`, values: { [bind]: value } };
}

/** AND a base condition with the caller's filters and apply ordering and paging. */
export function buildPqlQuery(options: QueryOptions = {}, base?: PqlCondition): PqlQuery {
  const clauses: string[] = base ? [base.where] : [];
  const values: Record<string, PqlValue> = { ...(base?.values ?? {}) };

  for (const [key, value] of Object.entries(options.where ?? {})) {
    if (!IDENTIFIER_RE.test(key)) {
      throw new ValidationError(`Invalid filter key: ${key}`);
    }
    const bind = `f_${key.replace(/\./g, "_")}`;
    if (typeof value === "object") {
      if (value.length === 0) {
        throw new ValidationError(`Filter ${key} has an empty value list`);
      }
      const names = value.map((item, index) => {
        values[`${bind}_${index}`] = item;
        return `:${bind}_${index}`;
      });
      clauses.push(`${key} IN (${names.join(", ")})`);
    } else {
      values[bind] = value;
      clauses.push(`${key} = :${bind}`);
    }
  }

  const query: PqlQuery = { values, orderBy: options.order ?? DEFAULT_ORDER };
  if (clauses.length > 0) query.where = clauses.join(" AND ");
  if (options.limit !== undefined) query.limit = options.limit;
  if (options.offset !== undefined) query.offset = options.offset;
  return query;
}
