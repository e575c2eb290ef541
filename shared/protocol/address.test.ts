import { describe, it, expect } from "vitest";
import { DEFAULT_DAEMON_ADDR, addressUrl, parseAddress } from "./address.js";

describe("parseAddress", () => {
  it("splits host and port", () => {
    expect(parseAddress(DEFAULT_DAEMON_ADDR)).toEqual({ host: "127.0.0.1", port: 8082 });
    expect(parseAddress(" localhost:9000 ")).toEqual({ host: "localhost", port: 9000 });
  });

  it("rejects an address without a usable port", () => {
    expect(() => parseAddress("localhost")).toThrow('invalid address "localhost"; expected host:port');
    expect(() => parseAddress("localhost:0")).toThrow('invalid address "localhost:0"; expected host:port');
    expect(() => parseAddress("localhost:70000")).toThrow(
      expect.objectContaining({ name: "ConfigurationError", input: "localhost:70000" }),
    );
  });
});

describe("addressUrl", () => {
  it("builds a WebSocket URL", () => {
    expect(addressUrl({ host: "127.0.0.1", port: 8082 })).toBe("ws://127.0.0.1:8082");
  });
});
