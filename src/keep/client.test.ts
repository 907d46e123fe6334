import { describe, it, expect, vi } from "vitest";
import { KeepApiError } from "../errors.js";
import { FakeKeepApi, connectedClient, rawLabel, rawNote, silentLogger } from "../testing/fake-keep.js";
import { KeepClient } from "./client.js";
import type { ChangesRequest, ChangesResponse } from "./wire.js";

function seededApi(): FakeKeepApi {
  return new FakeKeepApi({
    nodes: [
      ...rawNote({ id: "a", title: "Shopping", text: "milk", labelIds: ["tag.owned"] }),
      ...rawNote({ id: "b", title: "Shopping old", archived: true }),
      ...rawNote({ id: "c", text: "milk", trashed: true }),
      ...rawNote({ id: "d", title: "Work", text: "Milk run" }),
    ],
    labels: [rawLabel("tag.owned", "keep-mcp")],
  });
}

describe("KeepClient.sync", () => {
  it("pulls the whole account on the first sync", async () => {
    const api = seededApi();
    const client = await connectedClient(api);

    expect(api.requests).toHaveLength(1);
    expect(api.requests[0].targetVersion).toBeUndefined();
    expect(api.requests[0].nodes).toEqual([]);
    expect(client.all().map((note) => note.id)).toEqual(["a", "b", "c", "d"]);
    expect(client.get("a")?.text).toBe("milk");
    expect(client.get("a")?.labels.has("keep-mcp")).toBe(true);
  });

  it("sends dirty notes, their items and labels, then records server ids", async () => {
    const api = new FakeKeepApi();
    const client = await connectedClient(api);

    const note = client.createNote("Title", "Body");
    note.labels.add(client.createLabel("keep-mcp"));
    await client.sync();

    const request = api.requests[1];
    expect(request.targetVersion).toBe("2");
    expect(request.nodes.map((node) => node.type)).toEqual(["NOTE", "LIST_ITEM"]);
    expect(request.userInfo?.labels.map((label) => label.name)).toEqual(["keep-mcp"]);
    expect(note.serverId).toBe("srv-1");
    expect(note.dirty).toBe(false);
    expect(client.get("srv-1")).toBe(note);
    expect(note.text).toBe("Body");
    expect(note.labels.has("keep-mcp")).toBe(true);
  });

  it("sends nothing once every change has been accepted", async () => {
    const api = new FakeKeepApi();
    const client = await connectedClient(api);
    client.createNote("Title");
    await client.sync();
    await client.sync();

    expect(api.requests[2].nodes).toEqual([]);
    expect(api.requests[2].userInfo).toBeUndefined();
  });

  it("follows truncated pages", async () => {
    const changes = vi.fn<(request: ChangesRequest) => Promise<ChangesResponse>>();
    changes
      .mockResolvedValueOnce({ nodes: rawNote({ id: "a", title: "first" }), toVersion: "5", truncated: true })
      .mockResolvedValueOnce({ nodes: rawNote({ id: "b", title: "second" }), toVersion: "6" });

    const client = new KeepClient({ changes }, silentLogger);
    await client.sync();

    expect(changes).toHaveBeenCalledTimes(2);
    expect(changes.mock.calls[1][0].targetVersion).toBe("5");
    expect(client.all().map((note) => note.title)).toEqual(["first", "second"]);
  });

  it("refuses to continue when the service demands a full resync", async () => {
    const changes = vi.fn<(request: ChangesRequest) => Promise<ChangesResponse>>();
    changes.mockResolvedValueOnce({ nodes: [], forceFullResync: true });

    const client = new KeepClient({ changes }, silentLogger);
    await expect(client.sync()).rejects.toBeInstanceOf(KeepApiError);
  });

  it("keeps local edits dirty when the request fails", async () => {
    const api = seededApi();
    const client = await connectedClient(api);
    const note = client.get("a");
    if (!note) throw new Error("seed note missing");

    note.title = "Renamed";
    api.failNext(new KeepApiError("boom"));
    await expect(client.sync()).rejects.toThrow("boom");
    expect(note.dirty).toBe(true);

    await client.sync();
    expect(note.dirty).toBe(false);
    expect(api.nodes.get("a")?.title).toBe("Renamed");
  });

  it("removes notes once their deletion is synced", async () => {
    const api = seededApi();
    const client = await connectedClient(api);
    client.get("a")?.delete();
    await client.sync();

    expect(client.get("a")).toBeUndefined();
    expect(client.get("srv-a")).toBeUndefined();
    expect(client.all().map((note) => note.id)).toEqual(["b", "c", "d"]);
  });

  it("skips notes the server reports as deleted", async () => {
    const [note, item] = rawNote({ id: "gone", title: "Gone" });
    const api = new FakeKeepApi({
      nodes: [{ ...note, timestamps: { ...note.timestamps, deleted: "2024-06-01T00:00:00.000Z" } }, item],
    });
    const client = await connectedClient(api);

    expect(client.all()).toEqual([]);
  });
});

describe("KeepClient.find", () => {
  it("filters by archived and trashed state", async () => {
    const client = await connectedClient(seededApi());

    const ids = client.find("", { archived: false, trashed: false }).map((note) => note.id);
    expect(ids).toEqual(["a", "d"]);
  });

  it("matches title or text case-sensitively", async () => {
    const client = await connectedClient(seededApi());

    expect(client.find("milk", { archived: false, trashed: false }).map((note) => note.id)).toEqual(["a"]);
    expect(client.find("Shop").map((note) => note.id)).toEqual(["a", "b"]);
  });

  it("hides notes deleted locally but not yet synced", async () => {
    const client = await connectedClient(seededApi());
    client.get("d")?.delete();

    expect(client.find("").map((note) => note.id)).toEqual(["a", "b", "c"]);
  });
});

describe("KeepClient labels", () => {
  it("finds labels ignoring case", async () => {
    const client = await connectedClient(seededApi());
    expect(client.findLabel("KEEP-MCP")?.id).toBe("tag.owned");
  });

  it("refuses to create a label whose name already exists", async () => {
    const client = await connectedClient(seededApi());
    expect(() => client.createLabel("Keep-MCP")).toThrow(/already exists/);
  });
});
