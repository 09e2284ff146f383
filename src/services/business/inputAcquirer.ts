/**
 * Input Acquirer
 * Produces the single local input file of a request, either from uploaded
 * bytes or from a direct audio URL fetched under the acquisition policy.
 */

import { open, rm, writeFile, type FileHandle } from "fs/promises";
import type { AcquisitionPolicy } from "../../config/policy.js";
import type { InputFile } from "../../types/conversion.js";
import type { FetchLike } from "../../types/fetch.js";
import { extensionOf, inputFileName } from "../../utils/fileNames.js";
import {
  NetworkError,
  SizeLimitExceededError,
  ValidationError,
} from "../../utils/errors.js";
import type { Workspace } from "./workspace.js";

export interface InputAcquirerOptions {
  policy: AcquisitionPolicy;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
}

const BLOCKED_DOMAIN_MESSAGE =
  "Downloading from that domain is not allowed. Use a direct file URL or upload the file.";
const UNREACHABLE_MESSAGE = "Could not reach the URL.";
const DOWNLOAD_FAILED_MESSAGE = "Failed to download the file.";

export class InputAcquirer {
  private readonly policy: AcquisitionPolicy;
  private readonly fetchImpl: FetchLike;

  constructor(options: InputAcquirerOptions) {
    this.policy = options.policy;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Writes uploaded bytes verbatim into the workspace.
   * Uploads are not size- or type-checked.
   */
  async fromUpload(workspace: Workspace, fileName: string, bytes: Buffer): Promise<InputFile> {
    if (!fileName) {
      throw new ValidationError("No file uploaded.");
    }

    const extension = extensionOf(fileName);
    const inputPath = workspace.resolve(inputFileName(extension));
    await writeFile(inputPath, bytes);

    console.log(`[acquire] ${workspace.id} saved upload (${bytes.byteLength} bytes)`);
    return { path: inputPath, extension, bytes: bytes.byteLength };
  }

  /**
   * Downloads a direct audio URL into the workspace.
   * Blocked hosts are refused before any request is sent.
   */
  async fromUrl(workspace: Workspace, rawUrl: string): Promise<InputFile> {
    const url = this.parseUrl(rawUrl);
    this.assertHostAllowed(url);

    await this.checkContentType(url);

    const extension = extensionOf(url.pathname);
    const inputPath = workspace.resolve(inputFileName(extension));
    const bytes = await this.download(url, inputPath);

    console.log(`[acquire] ${workspace.id} downloaded ${bytes} bytes from ${url.hostname}`);
    return { path: inputPath, extension, bytes };
  }

  private isBlockedHost(url: URL): boolean {
    const host = url.hostname.toLowerCase().replace(/\.$/, "");
    return this.policy.blockedHosts.has(host);
  }

  private parseUrl(rawUrl: string): URL {
    let url: URL;
    try {
      url = new URL(rawUrl);
    } catch (error) {
      throw new ValidationError("Enter a valid direct audio file URL.", error);
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new ValidationError("Only http and https URLs are supported.");
    }
    return url;
  }

  private assertHostAllowed(url: URL): void {
    if (this.isBlockedHost(url)) {
      throw new ValidationError(BLOCKED_DOMAIN_MESSAGE);
    }
  }

  /**
   * Redirects are followed, so the final URL is checked against the block list too.
   */
  private assertRedirectAllowed(response: Response): void {
    if (!response.url) return;
    this.assertHostAllowed(new URL(response.url));
  }

  /**
   * HEAD pre-check of the declared Content-Type.
   * Content-Length is not consulted; the size cap is enforced in download().
   */
  private async checkContentType(url: URL): Promise<void> {
    let head: Response;
    try {
      head = await this.fetchImpl(url.href, {
        method: "HEAD",
        redirect: "follow",
        signal: AbortSignal.timeout(this.policy.headTimeoutMs),
      });
    } catch (error) {
      throw new NetworkError(UNREACHABLE_MESSAGE, error);
    }

    if (!head.ok) {
      throw new NetworkError(UNREACHABLE_MESSAGE);
    }
    this.assertRedirectAllowed(head);

    const contentType = head.headers.get("content-type") ?? "";
    const allowed = this.policy.allowedContentPrefixes.some((prefix) =>
      contentType.toLowerCase().startsWith(prefix)
    );
    if (!allowed) {
      throw new ValidationError(
        `URL does not look like a direct audio file (Content-Type: ${contentType || "unknown"}).`
      );
    }
  }

  /**
   * Streams the body to destPath, counting bytes actually received.
   * downloadTimeoutMs bounds the wait for headers and then every gap
   * between chunks. The partial file is deleted on any failure.
   */
  private async download(url: URL, destPath: string): Promise<number> {
    const controller = new AbortController();
    let idleTimer: NodeJS.Timeout | undefined;
    const rearmIdleTimer = () => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => controller.abort(), this.policy.downloadTimeoutMs);
    };

    rearmIdleTimer();
    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url.href, { redirect: "follow", signal: controller.signal });
      } catch (error) {
        throw new NetworkError(DOWNLOAD_FAILED_MESSAGE, error);
      }

      const body = response.body;
      if (!response.ok || !body) {
        controller.abort();
        throw new NetworkError(DOWNLOAD_FAILED_MESSAGE);
      }
      try {
        this.assertRedirectAllowed(response);
      } catch (error) {
        controller.abort();
        throw error;
      }

      return await this.writeBody(body, destPath, controller, rearmIdleTimer);
    } finally {
      clearTimeout(idleTimer);
    }
  }

  private async writeBody(
    body: NonNullable<Response["body"]>,
    destPath: string,
    controller: AbortController,
    onChunk: () => void
  ): Promise<number> {
    let file: FileHandle;
    try {
      file = await open(destPath, "w");
    } catch (error) {
      controller.abort();
      throw error;
    }

    const reader = body.getReader();
    let bytes = 0;
    let completed = false;

    try {
      for (;;) {
        const { done, value } = await reader.read().catch((error: unknown) => {
          throw new NetworkError(DOWNLOAD_FAILED_MESSAGE, error);
        });
        // A stream that ends quietly after the idle abort is still a failed transfer
        if (controller.signal.aborted) {
          throw new NetworkError(DOWNLOAD_FAILED_MESSAGE);
        }
        if (done) break;
        onChunk();

        const chunk: Uint8Array = value;
        bytes += chunk.byteLength;
        if (bytes > this.policy.maxBytes) {
          controller.abort();
          throw new SizeLimitExceededError(this.policy.maxBytes);
        }
        await file.write(chunk);
      }
      completed = true;
    } finally {
      await file.close();
      if (!completed) {
        await rm(destPath, { force: true });
      }
    }

    return bytes;
  }
}
