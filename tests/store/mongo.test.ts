import { describe, it, expect, vi, afterEach } from "vitest";
import mongoose, { Types, type Connection } from "mongoose";
import { MongoDocumentStore, openStore, toPublic } from "../../src/store/index.js";
import { toStored } from "../../src/store/mongo.js";
import { loadConfig } from "../../src/config.js";

describe("toStored", () => {
  it("splits an ObjectId _id from the fields", () => {
    const _id = new Types.ObjectId("65a1f0c2b3d4e5f607182930");
    const doc = toStored({ _id, name: "alpha", tags: ["api"] });

    expect(doc.id.key).toBe(_id);
    expect(doc.data).toEqual({ name: "alpha", tags: ["api"] });
    expect(toPublic(doc)).toEqual({ name: "alpha", tags: ["api"], id: "65a1f0c2b3d4e5f607182930" });
  });

  it("accepts a string _id written by another tool", () => {
    const doc = toStored({ _id: "external-key", name: "imported" });

    expect(doc.id.toString()).toBe("external-key");
    expect(toPublic(doc)).toEqual({ name: "imported", id: "external-key" });
  });
});

describe("MongoDocumentStore.connect", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function failingConnection() {
    const close = vi.fn().mockResolvedValue(undefined);
    const connection = {
      asPromise: vi.fn().mockRejectedValue(new Error("server selection timed out")),
      close,
    };
    vi.spyOn(mongoose, "createConnection").mockReturnValue(connection as unknown as Connection);
    return { close };
  }

  it("closes the connection when connecting fails", async () => {
    const { close } = failingConnection();

    await expect(MongoDocumentStore.connect("mongodb://db.invalid:27017/forge")).rejects.toThrow(
      "server selection timed out",
    );
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("still reports the connect error when closing fails too", async () => {
    const { close } = failingConnection();
    close.mockRejectedValue(new Error("already closed"));

    await expect(MongoDocumentStore.connect("mongodb://db.invalid:27017/forge")).rejects.toThrow(
      "server selection timed out",
    );
  });

  it("leaves openStore without a store and nothing open", async () => {
    const { close } = failingConnection();

    const store = await openStore(loadConfig({ DATABASE_URL: "mongodb://db.invalid:27017/forge" }));

    expect(store).toBeNull();
    expect(close).toHaveBeenCalledTimes(1);
  });
});
