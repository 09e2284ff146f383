import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, readdir, rm } from "fs/promises";
import path from "path";
import { createApp } from "../../src/app.js";
import { createAcquisitionPolicy } from "../../src/config/policy.js";
import { ConversionService } from "../../src/services/business/conversionService.js";
import { InputAcquirer } from "../../src/services/business/inputAcquirer.js";
import { MetadataService } from "../../src/services/business/metadataService.js";
import { Workspace } from "../../src/services/business/workspace.js";
import { ConversionError } from "../../src/utils/errors.js";
import {
  bodyResponse,
  chunks,
  FakeTranscoder,
  fakeFetch,
  headResponse,
  makeTempRoot,
  monoWav,
  startServer,
  type FakeRoutes,
  type RunningServer,
} from "../helpers/fakes.js";

describe("POST /convert", () => {
  let root: string;
  let server: RunningServer | undefined;

  beforeEach(async () => {
    root = await makeTempRoot();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    await server?.close();
    server = undefined;
    await rm(root, { recursive: true, force: true });
  });

  async function start(options: { routes?: FakeRoutes; transcoder?: FakeTranscoder } = {}) {
    const fetchSpy = fakeFetch(options.routes ?? {});
    const transcoder = options.transcoder ?? new FakeTranscoder();
    const acquirer = new InputAcquirer({
      policy: createAcquisitionPolicy({ maxBytes: 1024 * 1024 }),
      fetch: fetchSpy,
    });
    const app = createApp({
      workspaceRoot: root,
      conversionService: new ConversionService({ workspaceRoot: root, acquirer, transcoder }),
      metadataService: new MetadataService({ timeoutMs: 1000, fetch: fetchSpy }),
    });
    server = await startServer(app);
    return { baseUrl: server.baseUrl, fetchSpy, transcoder };
  }

  function form(fields: Record<string, string>, file?: { name: string; bytes: Buffer; field?: string }): FormData {
    const body = new FormData();
    for (const [key, value] of Object.entries(fields)) body.append(key, value);
    if (file) body.append(file.field ?? "file", new Blob([file.bytes]), file.name);
    return body;
  }

  async function expectWorkspacesGone(release: { mock: { calls: unknown[] } }, requests = 1): Promise<void> {
    await vi.waitFor(async () => {
      expect(release.mock.calls).toHaveLength(requests);
      expect(await readdir(root)).toEqual([]);
    });
  }

  it("converts an upload to AIFF and returns it as an attachment", async () => {
    const release = vi.spyOn(Workspace.prototype, "release");
    const { baseUrl, transcoder } = await start();

    const response = await fetch(`${baseUrl}/convert`, {
      method: "POST",
      body: form({ format: "aiff", rights: "on" }, { name: "take.wav", bytes: monoWav(8000, 5) }),
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("audio/aiff");
    expect(response.headers.get("content-disposition")).toMatch(/^attachment; filename="out_[0-9a-f]{32}\.aiff"$/);
    expect(await response.text()).toBe("converted:aiff");
    expect(transcoder.calls).toHaveLength(1);
    expect(transcoder.calls[0]?.input.bytes).toBe(44 + 8000 * 5 * 2);
    expect(transcoder.calls[0]?.input.extension).toBe(".wav");
    await expectWorkspacesGone(release);
  });

  it("refuses a blocked platform URL without fetching anything", async () => {
    const release = vi.spyOn(Workspace.prototype, "release");
    const { baseUrl, fetchSpy } = await start({ routes: { head: () => headResponse("audio/mpeg") } });

    const response = await fetch(`${baseUrl}/convert`, {
      method: "POST",
      body: form({ rights: "on", file_url: "https://youtube.com/watch?v=x" }),
    });

    expect(response.status).toBe(400);
    expect(response.headers.get("content-type")).toMatch(/^text\/plain/);
    expect(await response.text()).toBe(
      "Downloading from that domain is not allowed. Use a direct file URL or upload the file."
    );
    expect(fetchSpy).not.toHaveBeenCalled();
    await expectWorkspacesGone(release);
  });

  it("aborts a download over the cap and leaves nothing behind", async () => {
    const release = vi.spyOn(Workspace.prototype, "release");
    const { baseUrl, transcoder } = await start({
      routes: { head: () => headResponse("audio/wav"), get: () => bodyResponse(chunks(64 * 1024, 20)) },
    });

    const response = await fetch(`${baseUrl}/convert`, {
      method: "POST",
      body: form({ rights: "on", file_url: "https://cdn.example.com/huge.wav" }),
    });

    expect(response.status).toBe(400);
    expect(await response.text()).toBe("File is larger than the 1 MB limit.");
    expect(transcoder.calls).toEqual([]);
    await expectWorkspacesGone(release);
  });

  it("rejects a URL that is not audio without issuing the GET", async () => {
    const release = vi.spyOn(Workspace.prototype, "release");
    const { baseUrl, fetchSpy } = await start({
      routes: { head: () => headResponse("text/html"), get: () => bodyResponse("<html>") },
    });

    const response = await fetch(`${baseUrl}/convert`, {
      method: "POST",
      body: form({ rights: "on", file_url: "https://example.com/song" }),
    });

    expect(response.status).toBe(400);
    expect(await response.text()).toBe("URL does not look like a direct audio file (Content-Type: text/html).");
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    await expectWorkspacesGone(release);
  });

  it("accepts a urlencoded URL post and defaults to WAV", async () => {
    const release = vi.spyOn(Workspace.prototype, "release");
    const { baseUrl } = await start({
      routes: { head: () => headResponse("audio/flac"), get: () => bodyResponse(chunks(100, 3)) },
    });

    const response = await fetch(`${baseUrl}/convert`, {
      method: "POST",
      body: new URLSearchParams({ rights: "on", file_url: "https://cdn.example.com/a.flac" }),
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("audio/x-wav");
    expect(await response.text()).toBe("converted:wav");
    await expectWorkspacesGone(release);
  });

  it.each([
    [{ format: "wav" }, "You must confirm you have rights to this content."],
    [{ format: "mp3", rights: "on" }, "Unsupported output format."],
    [{ rights: "on" }, "Provide a file upload or a direct audio file URL."],
    [{ rights: "on", file_url: "not a url" }, "Enter a valid direct audio file URL."],
  ])("answers %j with 400", async (fields, message) => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/convert`, { method: "POST", body: form(fields) });

    expect(response.status).toBe(400);
    expect(await response.text()).toBe(message);
    await vi.waitFor(async () => expect(await readdir(root)).toEqual([]));
  });

  it("reports the engine diagnostic", async () => {
    const release = vi.spyOn(Workspace.prototype, "release");
    const { baseUrl } = await start({
      transcoder: new FakeTranscoder(new ConversionError("in_x.mp3: Invalid data found when processing input")),
    });

    const response = await fetch(`${baseUrl}/convert`, {
      method: "POST",
      body: form({ rights: "on" }, { name: "broken.mp3", bytes: Buffer.from("not audio") }),
    });

    expect(response.status).toBe(400);
    expect(await response.text()).toBe("Conversion failed: in_x.mp3: Invalid data found when processing input");
    await expectWorkspacesGone(release);
  });

  it("answers an unexpected failure with a bare 500", async () => {
    const { baseUrl } = await start({ transcoder: new FakeTranscoder(new Error("EACCES: permission denied")) });

    const response = await fetch(`${baseUrl}/convert`, {
      method: "POST",
      body: form({ rights: "on" }, { name: "a.mp3", bytes: Buffer.from("x") }),
    });

    expect(response.status).toBe(500);
    expect(await response.text()).toBe("Internal server error");
  });

  it("rejects a file sent under another field name", async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/convert`, {
      method: "POST",
      body: form({ rights: "on" }, { name: "a.mp3", bytes: Buffer.from("x"), field: "audio" }),
    });

    expect(response.status).toBe(400);
    expect(await response.text()).toBe("Unexpected field");
  });

  it("limits conversions per app instance", async () => {
    const unconfirmed = () => new URLSearchParams({ format: "wav" });
    let { baseUrl } = await start();

    for (let i = 0; i < 20; i++) {
      const response = await fetch(`${baseUrl}/convert`, { method: "POST", body: unconfirmed() });
      expect(response.status).toBe(400);
      await response.text();
    }
    const limited = await fetch(`${baseUrl}/convert`, { method: "POST", body: unconfirmed() });
    expect(limited.status).toBe(429);
    expect(await limited.text()).toBe("Too many conversions, please slow down.");

    await server?.close();
    ({ baseUrl } = await start());
    const fresh = await fetch(`${baseUrl}/convert`, { method: "POST", body: unconfirmed() });
    expect(fresh.status).toBe(400);
    expect(await fresh.text()).toBe("You must confirm you have rights to this content.");
  });
});

describe("service routes", () => {
  let root: string;
  let server: RunningServer | undefined;

  beforeEach(async () => {
    root = await mkdtemp(path.join(await makeTempRoot(), "root-"));
  });

  afterEach(async () => {
    await server?.close();
    server = undefined;
    await rm(path.dirname(root), { recursive: true, force: true });
  });

  async function start(): Promise<string> {
    const acquirer = new InputAcquirer({ policy: createAcquisitionPolicy(), fetch: fakeFetch({}) });
    const app = createApp({
      workspaceRoot: root,
      conversionService: new ConversionService({ workspaceRoot: root, acquirer, transcoder: new FakeTranscoder() }),
      metadataService: new MetadataService({ timeoutMs: 1000, fetch: fakeFetch({}) }),
    });
    server = await startServer(app);
    return server.baseUrl;
  }

  it("serves the form page", async () => {
    const baseUrl = await start();

    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(await response.text()).toContain(`<form method="post" action="/convert" enctype="multipart/form-data"`);
    expect(response.headers.get("x-powered-by")).toBeNull();
  });

  it("reports liveness and readiness", async () => {
    const baseUrl = await start();

    expect(await (await fetch(`${baseUrl}/health`)).json()).toEqual({ ok: true });
    expect(await (await fetch(`${baseUrl}/ready`)).json()).toEqual({ ready: true });

    await rm(root, { recursive: true, force: true });
    const notReady = await fetch(`${baseUrl}/ready`);
    expect(notReady.status).toBe(503);
    expect(await notReady.json()).toEqual({ ready: false, reason: "workspace root is not writable" });
  });

  it("answers unknown routes with 404", async () => {
    const baseUrl = await start();

    const response = await fetch(`${baseUrl}/download`);

    expect(response.status).toBe(404);
    expect(await response.text()).toBe("Not found");
  });
});
