import { describe, expect, it } from "vitest";
import { toProductPayload } from "./index";

describe("toProductPayload", () => {
  it("capitalizes field names without touching values", () => {
    const payload = toProductPayload({ id: 7, name: "Azul", slug: "azul", description: "Tiles." });
    expect(JSON.stringify(payload)).toBe(
      '{"ID":7,"Name":"Azul","Slug":"azul","Description":"Tiles."}',
    );
  });
});
