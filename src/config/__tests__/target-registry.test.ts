import { describe, it, expect } from "vitest";
import { TargetRegistry } from "../target-registry";

describe("TargetRegistry", () => {
  const registry = new TargetRegistry([
    { hostname: "api.example.test", port: 443, label: "API" },
    { hostname: "db.internal.example.test", port: 5432 },
    { hostname: "::1", port: 8080, label: "  " },
  ]);

  it("should keep configuration order", () => {
    expect(registry.size).toBe(3);
    expect(registry.endpoints.map((e) => e.hostname)).toEqual([
      "api.example.test",
      "db.internal.example.test",
      "::1",
    ]);
  });

  it("should fill in missing or blank labels from the hostname", () => {
    expect(registry.endpoints.map((e) => e.label)).toEqual(["API", "db", "::1"]);
  });

  it("should describe targets for the startup banner", () => {
    expect(registry.describe()).toBe(
      "API (api.example.test:443), db (db.internal.example.test:5432), ::1 ([::1]:8080)"
    );
  });

  it("should not allow the list or its entries to change", () => {
    expect(Object.isFrozen(registry.endpoints)).toBe(true);
    expect(Object.isFrozen(registry.endpoints[0])).toBe(true);
  });

  it("should be empty without targets", () => {
    const empty = new TargetRegistry([]);
    expect(empty.size).toBe(0);
    expect(empty.describe()).toBe("");
  });
});
