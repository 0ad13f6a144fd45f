import { describe, expect, it } from "vitest";
import { DEFAULT_ORDER, buildPqlQuery, toPqlId, whereEquals } from "../../../../src/adapters/gam/pql.js";
import { ValidationError } from "../../../../src/core/errors.js";

describe("toPqlId", () => {
  it("accepts numeric ids", () => {
    expect(toPqlId("12345")).toBe(12345);
  });

  it("rejects anything else", () => {
    expect(() => toPqlId("12a")).toThrow("Invalid GAM id: 12a");
    expect(() => toPqlId("")).toThrow(ValidationError);
  });
});

describe("buildPqlQuery", () => {
  it("defaults the order and leaves paging unset", () => {
    expect(buildPqlQuery()).toEqual({ values: {}, orderBy: DEFAULT_ORDER });
  });

  it("binds filters after the base condition", () => {
    const query = buildPqlQuery(
      { where: { status: "READY", "targeting.geo": "US" }, order: "name DESC", limit: 5, offset: 10 },
      whereEquals("orderId", 200)
    );
    expect(query).toEqual({
      where: "orderId = :orderId AND status = :f_status AND targeting.geo = :f_targeting_geo",
      values: { orderId: 200, f_status: "READY", f_targeting_geo: "US" },
      orderBy: "name DESC",
      limit: 5,
      offset: 10,
    });
  });

  it("turns lists into IN clauses", () => {
    expect(buildPqlQuery({ where: { id: [1, 2, 3] } })).toMatchObject({
      where: "id IN (:f_id_0, :f_id_1, :f_id_2)",
      values: { f_id_0: 1, f_id_1: 2, f_id_2: 3 },
    });
  });

  it("rejects keys that are not identifiers", () => {
    expect(() => buildPqlQuery({ where: { "name = 'x' OR 1": 1 } })).toThrow(ValidationError);
  });

  it("rejects empty lists", () => {
    expect(() => buildPqlQuery({ where: { id: [] } })).toThrow("Filter id has an empty value list");
  });
});
