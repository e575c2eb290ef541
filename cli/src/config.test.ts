import { describe, it, expect } from "vitest";
import { readCliConfig } from "./config.js";

describe("readCliConfig", () => {
  it("defaults to the local daemon without media", () => {
    expect(readCliConfig({})).toEqual({
      address: { host: "127.0.0.1", port: 8082 },
      imagePath: undefined,
      soundPath: undefined,
    });
  });

  it("reads the address and default media paths", () => {
    expect(
      readCliConfig({
        NUDGE_DAEMON_ADDR: "10.0.0.5:9000",
        NUDGE_IMAGE_PATH: "/usr/share/icons/bell.png",
        NUDGE_SOUND_PATH: "Ping",
      }),
    ).toEqual({
      address: { host: "10.0.0.5", port: 9000 },
      imagePath: "/usr/share/icons/bell.png",
      soundPath: "Ping",
    });
  });

  it("rejects a malformed address", () => {
    expect(() => readCliConfig({ NUDGE_DAEMON_ADDR: "nowhere" })).toThrow(
      'invalid address "nowhere"; expected host:port',
    );
  });
});
