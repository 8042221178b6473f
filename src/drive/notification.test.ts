import { describe, expect, it } from "vitest";
import { parseDriveNotification } from "./notification.js";

describe("parseDriveNotification", () => {
  it("reads the sync handshake from headers", () => {
    expect(parseDriveNotification({ "x-goog-resource-state": "sync" }, {})).toEqual({
      kind: "sync",
      challenge: "",
    });
  });

  it("reads a change from headers", () => {
    const headers = {
      "x-goog-resource-state": "update",
      "x-goog-resource-id": "res-1",
      "x-goog-channel-id": "chan-1",
      "x-goog-channel-token": "test-secret",
    };
    expect(parseDriveNotification(headers, {})).toEqual({
      kind: "change",
      resourceId: "res-1",
      channelId: "chan-1",
      token: "test-secret",
    });
  });

  it("rejects an unknown resource state", () => {
    expect(parseDriveNotification({ "x-goog-resource-state": "bogus" }, {})).toBeNull();
  });

  it("falls back to a JSON body", () => {
    expect(parseDriveNotification({}, { type: "sync", challenge: "abc" })).toEqual({
      kind: "sync",
      challenge: "abc",
    });
    expect(parseDriveNotification({}, { type: "change", resourceId: "res-2" })).toEqual({
      kind: "change",
      resourceId: "res-2",
      channelId: "",
      token: null,
    });
  });

  it("returns null for an unrecognizable body", () => {
    expect(parseDriveNotification({}, { type: "ping" })).toBeNull();
    expect(parseDriveNotification({}, undefined)).toBeNull();
  });
});
