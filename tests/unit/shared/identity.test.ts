import { describe, it, expect } from "vitest";
import { localpart, normalizeIdentifier } from "@src/shared/identity.js";

describe("localpart", () => {
  it("strips the sigil and server", () => {
    expect(localpart("@alice:example.org")).toBe("alice");
  });

  it("returns bare names unchanged", () => {
    expect(localpart("alice")).toBe("alice");
  });
});

describe("normalizeIdentifier", () => {
  const server = "school.test";

  it("keeps a full chat identity", () => {
    expect(normalizeIdentifier("@prof:other.test", server)).toEqual({
      chatId: "@prof:other.test",
      localpart: "prof",
    });
  });

  it("qualifies a sigil without server", () => {
    expect(normalizeIdentifier("@prof", server)).toEqual({
      chatId: "@prof:school.test",
      localpart: "prof",
    });
  });

  it("qualifies a bare localpart", () => {
    expect(normalizeIdentifier("  prof ", server)).toEqual({
      chatId: "@prof:school.test",
      localpart: "prof",
    });
  });

  it("rejects empty input", () => {
    expect(normalizeIdentifier("   ", server)).toBeNull();
    expect(normalizeIdentifier("@", server)).toBeNull();
  });
});
