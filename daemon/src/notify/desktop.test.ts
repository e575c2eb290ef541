import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockNotify } = vi.hoisted(() => ({
  mockNotify: vi.fn(),
}));

vi.mock("node-notifier", () => ({
  default: { notify: mockNotify },
}));

import { createDesktopNotifier } from "./desktop.js";
import { NotifyError } from "./types.js";

describe("createDesktopNotifier", () => {
  beforeEach(() => {
    mockNotify.mockReset();
  });

  it("maps the notification onto node-notifier options", async () => {
    mockNotify.mockImplementation((_options: unknown, callback: (err: Error | null) => void) => callback(null));

    await createDesktopNotifier().notify({
      summary: "nudge",
      body: "drink water",
      image: "/tmp/cup.png",
      sound: "Glass",
    });

    expect(mockNotify).toHaveBeenCalledTimes(1);
    expect(mockNotify.mock.calls[0][0]).toEqual({
      title: "nudge",
      message: "drink water",
      icon: "/tmp/cup.png",
      sound: "Glass",
      wait: false,
    });
  });

  it("plays no sound unless one is given", async () => {
    mockNotify.mockImplementation((_options: unknown, callback: (err: Error | null) => void) => callback(null));

    await createDesktopNotifier().notify({ summary: "nudge", body: "stand up" });

    expect(mockNotify.mock.calls[0][0]).toMatchObject({ sound: false, icon: undefined });
  });

  it("rejects with NotifyError when the notification center reports an error", async () => {
    mockNotify.mockImplementation((_options: unknown, callback: (err: Error | null) => void) =>
      callback(new Error("no notification daemon")),
    );

    const result = createDesktopNotifier().notify({ summary: "nudge", body: "stand up" });

    await expect(result).rejects.toBeInstanceOf(NotifyError);
    await expect(result).rejects.toThrow("desktop notification failed: no notification daemon");
  });
});
