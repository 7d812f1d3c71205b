import { describe, expect, it } from "vitest";
import { normalizeHostname, siteKey } from "../src/utils/site-key.js";

describe("normalizeHostname", () => {
  it("reduces URLs to their host", () => {
    expect(normalizeHostname("https://shop.example.com/checkout?x=1")).toBe("shop.example.com");
    expect(normalizeHostname("http://shop.example.com:8080")).toBe("shop.example.com");
    expect(normalizeHostname("https://[::1]:8443/")).toBe("::1");
  });

  it("keeps bare hosts", () => {
    expect(normalizeHostname(" shop.example.com ")).toBe("shop.example.com");
  });
});

describe("siteKey", () => {
  it("joins the normalised host and port", () => {
    expect(siteKey({ hostname: "https://shop.example.com", port: 443 })).toBe("shop.example.com:443");
    expect(siteKey({ hostname: "api.example.com", port: 8443 })).toBe("api.example.com:8443");
  });
});
