import { createHash } from "crypto";
import { decode, encode } from "cborg";
import { z } from "zod";
import type { Logger } from "../logger.js";
import type { DfuVerifyMode, Result } from "../types.js";
import type { DfuOptions, SerialLink } from "./link.js";
import { silentLogger } from "../logger.js";
import { createError, err, ok, toCoreError } from "../types.js";
import { DFU_TIMEOUT_MS, MCUBOOT_BAUD_RATE, MCUBOOT_CHUNK_SIZE } from "../config.js";
import { FrameReader, openSerialLink } from "./link.js";
import {
  decodeSmp,
  encodeSerialFrames,
  encodeSmp,
  SerialFrameAssembler,
  SMP_GROUP_IMAGE,
  SMP_GROUP_OS,
  SMP_OP_READ,
  SMP_OP_WRITE,
} from "./smp.js";

const OS_RESET = 5;
const IMAGE_STATE = 0;
const IMAGE_UPLOAD = 1;

const SMP_ERRORS: Record<number, string> = {
  1: "unknown",
  2: "out of memory",
  3: "invalid value",
  4: "timeout",
  5: "no such entry",
  6: "bad state",
  7: "message too large",
  8: "not supported",
  9: "corrupt",
  10: "busy",
};

const statusSchema = z.object({
  rc: z.number().int().optional(),
  err: z.object({ group: z.number().int(), rc: z.number().int() }).optional(),
});

const uploadSchema = z.object({ off: z.number().int().nonnegative() });

const imageListSchema = z.object({
  images: z.array(
    z.object({
      image: z.number().int().default(0),
      slot: z.number().int(),
      version: z.string(),
      hash: z.instanceof(Uint8Array).optional(),
    }),
  ),
});

export interface McubootImage {
  image: number;
  slot: number;
  version: string;
  hash?: Uint8Array;
}

export interface McubootDfuOptions extends DfuOptions {
  // Image bytes per upload request
  chunkSize?: number;
}

export interface McubootUploadOptions {
  image?: number;
  reset?: boolean;
}

function checkStatus(raw: unknown, action: string): void {
  const status = statusSchema.safeParse(raw);
  const rc = status.success ? (status.data.err?.rc ?? status.data.rc ?? 0) : 0;
  if (rc !== 0) {
    throw createError("DFU_ERROR", `${action} failed with SMP error ${rc} (${SMP_ERRORS[rc] ?? "unrecognized"})`);
  }
}

/**
 * Firmware upload to an MCUboot bootloader in serial recovery mode. Requests
 * are SMP packets in console framing; one request is in flight at a time.
 */
export class McubootDfu {
  private sequence = 0;
  private readonly reader: FrameReader;
  private readonly assembler = new SerialFrameAssembler();
  private readonly timeoutMs: number;
  private readonly verify: DfuVerifyMode;
  private readonly chunkSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly link: SerialLink,
    options: McubootDfuOptions = {},
  ) {
    this.reader = new FrameReader(link, 0x0a);
    this.timeoutMs = options.timeoutMs ?? DFU_TIMEOUT_MS;
    this.verify = options.verify ?? "NONE";
    this.chunkSize = options.chunkSize ?? MCUBOOT_CHUNK_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  static async open(path: string, options: McubootDfuOptions = {}): Promise<Result<McubootDfu>> {
    try {
      const link = await openSerialLink(path, options.baudRate ?? MCUBOOT_BAUD_RATE);
      return ok(new McubootDfu(link, options));
    } catch (e) {
      return err(toCoreError(e));
    }
  }

  private async run<T>(operation: string, action: () => Promise<T>): Promise<Result<T>> {
    try {
      return ok(await action());
    } catch (e) {
      const error = toCoreError(e);
      this.logger.log("error", `${operation} failed: ${error.message}`);
      return err(error);
    }
  }

  private async request(op: number, group: number, id: number, body: Record<string, unknown>): Promise<unknown> {
    const sequence = this.sequence;
    this.sequence = (sequence + 1) & 0xff;
    const packet = encodeSmp({ op, flags: 0, group, sequence, id }, encode(body));

    this.reader.clear();
    await this.link.write(encodeSerialFrames(packet));
    for (;;) {
      const frame = await this.reader.next(this.timeoutMs, `SMP request (group ${group}, command ${id})`);
      const response = this.assembler.push(frame);
      if (response === null) {
        continue;
      }
      const { header, payload } = decodeSmp(response);
      if (header.op !== op + 1 || header.group !== group || header.id !== id || header.sequence !== sequence) {
        this.logger.log(
          "debug",
          `Skipping unrelated SMP response (group ${header.group}, command ${header.id}, sequence ${header.sequence})`,
        );
        continue;
      }
      if (payload.length === 0) {
        return {};
      }
      const decoded: unknown = decode(payload);
      return decoded;
    }
  }

  /**
   * Upload a signed application image. The bootloader checks the SHA-256
   * digest when `verify` is HASH. The device is reset afterwards unless
   * `reset` is false.
   */
  program(image: Uint8Array, options: McubootUploadOptions = {}): Promise<Result<void>> {
    return this.run("program", async () => {
      if (image.length === 0) {
        throw createError("INVALID_PARAMETER", "Firmware image is empty");
      }
      if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
        throw createError("INVALID_PARAMETER", `Invalid upload chunk size ${this.chunkSize}`);
      }

      this.logger.progress("upload");
      this.logger.log("info", `Uploading ${image.length} bytes to MCUboot`);
      const digest = this.verify === "HASH" ? new Uint8Array(createHash("sha256").update(image).digest()) : null;

      let offset = 0;
      while (offset < image.length) {
        const body: Record<string, unknown> = { off: offset, data: image.slice(offset, offset + this.chunkSize) };
        if (offset === 0) {
          body.len = image.length;
          if (options.image) {
            body.image = options.image;
          }
          if (digest) {
            body.sha = digest;
          }
        }

        const raw = await this.request(SMP_OP_WRITE, SMP_GROUP_IMAGE, IMAGE_UPLOAD, body);
        checkStatus(raw, `Upload at offset ${offset}`);
        const parsed = uploadSchema.safeParse(raw);
        if (!parsed.success) {
          throw createError("DFU_ERROR", `Upload response at offset ${offset} carries no offset`);
        }
        const next = parsed.data.off;
        if (next <= offset || next > image.length) {
          throw createError("DFU_ERROR", `MCUboot answered offset ${next} to an upload at offset ${offset}`);
        }
        this.logger.log("debug", `Uploaded ${next}/${image.length} bytes`);
        offset = next;
      }

      if (options.reset ?? true) {
        await this.resetDevice();
      }
    });
  }

  listImages(): Promise<Result<McubootImage[]>> {
    return this.run("listImages", async () => {
      const raw = await this.request(SMP_OP_READ, SMP_GROUP_IMAGE, IMAGE_STATE, {});
      checkStatus(raw, "Image list");
      const parsed = imageListSchema.safeParse(raw);
      if (!parsed.success) {
        throw createError("DFU_ERROR", "Malformed image list response");
      }
      return parsed.data.images;
    });
  }

  reset(): Promise<Result<void>> {
    return this.run("reset", () => this.resetDevice());
  }

  private async resetDevice(): Promise<void> {
    this.logger.progress("reset");
    checkStatus(await this.request(SMP_OP_WRITE, SMP_GROUP_OS, OS_RESET, {}), "Reset");
  }

  close(): Promise<Result<void>> {
    return this.run("close", () => this.link.close());
  }
}
