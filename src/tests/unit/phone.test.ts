import { describe, expect, it } from "vitest";
import { maskPhone, normalizePhone } from "../../libs/phone.js";

describe("normalizePhone", () => {
  it("strips separators and keeps E.164", () => {
    expect(normalizePhone("+7 (999) 123-45-67")).toBe("+79991234567");
    expect(normalizePhone(" +49.151.2345.6789 ")).toBe("+4915123456789");
  });

  it("turns a leading 00 into +", () => {
    expect(normalizePhone("0079991234567")).toBe("+79991234567");
  });

  it("adds a missing +", () => {
    expect(normalizePhone("79991234567")).toBe("+79991234567");
  });

  it("rejects numbers outside E.164", () => {
    expect(normalizePhone("+0123456789")).toBeNull();
    expect(normalizePhone("12345")).toBeNull();
    expect(normalizePhone("+1234567890123456")).toBeNull();
    expect(normalizePhone("not-a-number")).toBeNull();
    expect(normalizePhone("")).toBeNull();
  });
});

describe("maskPhone", () => {
  it("keeps country prefix and last four digits", () => {
    expect(maskPhone("+79991234567")).toBe("+7******4567");
  });

  it("masks short values completely", () => {
    expect(maskPhone("12345")).toBe("***");
  });
});
