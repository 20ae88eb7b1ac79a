import { describe, expect, it } from "vitest";
import type { ImageSegment } from "../types.js";
import { nrf52840 } from "./sim/profiles.js";
import { bytes, failure, openSim, pattern, value } from "./sim/harness.js";

async function* streamed(segments: ImageSegment[]): AsyncGenerator<ImageSegment> {
  for (const segment of segments) {
    yield segment;
  }
}

describe("program", () => {
  it("erases, writes, verifies and resets with the default policy", async () => {
    const { target, session, logger } = await openSim(nrf52840());
    const image = pattern(0x120, 1);

    value(await session.program([{ address: 0x1000, data: image }], { verify: "READ_BACK" }));

    expect(logger.phases).toEqual(["erase", "program", "verify", "reset"]);
    expect(target.dumpBytes(0x1000, image.length)).toEqual(image);
    expect(target.counters.systemReset).toBe(1);
    expect(session.state).toBe("ATTACHED_HALTED");
    expect(target.coreHalted).toBe(true);
  });

  it("accepts an async segment stream and verifies by hash", async () => {
    const { target, session } = await openSim(nrf52840());
    const segments = [
      { address: 0x0000, data: pattern(64, 0x10) },
      { address: 0x4000, data: pattern(32, 0x80) },
    ];

    value(await session.program(streamed(segments), { verify: "HASH", reset: "NONE" }));

    expect(target.dumpBytes(0x0000, 64)).toEqual(pattern(64, 0x10));
    expect(target.dumpBytes(0x4000, 32)).toEqual(pattern(32, 0x80));
    expect(target.counters.systemReset).toBe(0);
  });

  it("refuses to program over non-erased cells without an erase", async () => {
    const { session } = await openSim(nrf52840(), { prepare: (t) => t.poke(0x2000, 0x12345678) });

    const error = failure(
      await session.program([{ address: 0x2000, data: bytes(1, 2, 3, 4) }], { chipEraseMode: "NONE" }),
    );

    expect(error.code).toBe("NVMC_ERROR");
    expect(error.message).toBe(
      "Failed programming segment at 0x00002000: Flash word at 0x00002000 is not erased (0x12345678)",
    );
    expect(session.state).toBe("ATTACHED_HALTED");
  });

  it("refuses to write 0xFF bytes over programmed cells", async () => {
    const { target, session } = await openSim(nrf52840(), { prepare: (t) => t.poke(0x2000, 0x12345678) });

    const error = failure(
      await session.program([{ address: 0x2000, data: bytes(0xff, 0xff, 0xff, 0xff) }], { chipEraseMode: "NONE" }),
    );

    expect(error.code).toBe("NVMC_ERROR");
    expect(error.message).toBe(
      "Failed programming segment at 0x00002000: Flash word at 0x00002000 is not erased (0x12345678)",
    );
    expect(target.peek(0x2000)).toBe(0x12345678);
  });

  it("reports the first programmed word inside a longer segment", async () => {
    const { target, session } = await openSim(nrf52840(), { prepare: (t) => t.poke(0x2008, 0xffff00ff) });

    const error = failure(await session.program([{ address: 0x2000, data: pattern(16, 1) }], { chipEraseMode: "NONE" }));

    expect(error.code).toBe("NVMC_ERROR");
    expect(error.message).toBe(
      "Failed programming segment at 0x00002000: Flash word at 0x00002008 is not erased (0xFFFF00FF)",
    );
    expect(target.peek(0x2000)).toBe(0xffffffff);
  });

  it("programs two segments that share a flash word", async () => {
    const { target, session } = await openSim(nrf52840());

    value(
      await session.program(
        [
          { address: 0x1000, data: bytes(1, 2) },
          { address: 0x1002, data: bytes(3, 4) },
        ],
        { chipEraseMode: "PAGES", reset: "NONE" },
      ),
    );

    expect(target.peek(0x1000)).toBe(0x04030201);
  });

  it("erases only the touched pages and pads partial words", async () => {
    const { target, session, logger } = await openSim(nrf52840(), {
      prepare: (t) => {
        t.poke(0x1ffc, 0);
        t.poke(0x2000, 0x11111111);
      },
    });

    value(
      await session.program([{ address: 0x1001, data: bytes(0xaa, 0xbb, 0xcc) }], {
        chipEraseMode: "PAGES",
        reset: "NONE",
      }),
    );

    expect(target.peek(0x1000)).toBe(0xccbbaaff);
    expect(target.peek(0x1ffc)).toBe(0xffffffff);
    expect(target.peek(0x2000)).toBe(0x11111111);
    expect(logger.phases).toEqual(["erase", "program"]);
  });

  it("requires PAGES_INCLUDING_UICR for UICR segments", async () => {
    const { target, session } = await openSim(nrf52840());
    const image = [{ address: 0x10001080, data: bytes(1, 2, 3, 4) }];

    const error = failure(await session.program(image, { chipEraseMode: "PAGES" }));
    expect(error.code).toBe("INVALID_OPERATION");
    expect(error.message).toBe(
      "UICR erase requested in Pages mode (segment at 0x10001080); use PAGES_INCLUDING_UICR",
    );

    value(await session.program(image, { chipEraseMode: "PAGES_INCLUDING_UICR" }));
    expect(target.peek(0x10001080)).toBe(0x04030201);
  });

  it("rejects overlapping segments before touching the device", async () => {
    const { target, session } = await openSim(nrf52840(), { prepare: (t) => t.poke(0x1000, 0) });

    const error = failure(
      await session.program([
        { address: 0x1000, data: pattern(8) },
        { address: 0x1004, data: pattern(4) },
      ]),
    );

    expect(error.code).toBe("INVALID_PARAMETER");
    expect(error.message).toBe("Segment at 0x00001004 overlaps or precedes the segment ending at 0x00001008");
    expect(target.peek(0x1000)).toBe(0);
  });

  it("rejects a segment running off the end of flash", async () => {
    const { session } = await openSim(nrf52840());

    const error = failure(await session.program([{ address: 0xffffc, data: pattern(8) }]));

    expect(error.code).toBe("CROSSES_MEMORY_BARRIER");
  });

  it("reports the first mismatching byte on verify", async () => {
    const { session } = await openSim(nrf52840(), { prepare: (t) => t.loadBytes(0, bytes(1, 2, 3, 4)) });

    const error = failure(await session.verify([{ address: 0, data: bytes(1, 9, 3, 4) }], "READ_BACK"));

    expect(error.code).toBe("VERIFY_ERROR");
    expect(error.message).toBe("Verify failed at 0x00000001: expected 0x00000009, read 0x00000002");
  });

  it("passes verify when the device matches", async () => {
    const { session, logger } = await openSim(nrf52840(), { prepare: (t) => t.loadBytes(0x800, pattern(16, 3)) });

    value(await session.verify([{ address: 0x800, data: pattern(16, 3) }], "HASH"));

    expect(logger.phases).toEqual(["verify"]);
  });

  it("needs QSPI for XIP segments", async () => {
    const { session } = await openSim(nrf52840());

    const error = failure(await session.program([{ address: 0x12000000, data: pattern(4) }]));

    expect(error.code).toBe("INVALID_OPERATION");
    expect(error.message).toBe("XIP flash access requires QSPI to be initialized");
  });

  it("skips the QSPI erase when QSPI is not initialized", async () => {
    const { session, logger } = await openSim(nrf52840());

    value(
      await session.program([{ address: 0, data: pattern(4) }], {
        chipEraseMode: "NONE",
        qspiEraseMode: "ALL",
        reset: "NONE",
      }),
    );

    expect(logger.lines).toContainEqual({
      severity: "debug",
      message: "QSPI erase ALL skipped; QSPI is not initialized",
    });
  });

  it("programs XIP flash through QSPI", async () => {
    const { target, session } = await openSim(nrf52840());
    value(await session.qspiInit());

    value(
      await session.program([{ address: 0x12001000, data: pattern(8, 0x20) }], {
        qspiEraseMode: "PAGES",
        verify: "READ_BACK",
        reset: "NONE",
      }),
    );

    expect(target.qspiFlash?.subarray(0x1000, 0x1008)).toEqual(pattern(8, 0x20));
  });

  it("writes RAM segments and refuses powered-down sections", async () => {
    const { target, session } = await openSim(nrf52840());

    value(await session.program([{ address: 0x20001000, data: bytes(5, 6, 7, 8) }], { reset: "NONE" }));
    expect(target.peek(0x20001000)).toBe(0x08070605);

    value(await session.unpowerRamSection(0));
    const error = failure(await session.program([{ address: 0x20000000, data: bytes(1, 2, 3, 4) }]));
    expect(error.code).toBe("RAM_OFF_ERROR");
    expect(error.message).toBe("RAM at 0x20000000 is in a powered-down section");
  });

  it("refuses to write FICR", async () => {
    const { session } = await openSim(nrf52840());

    const error = failure(await session.program([{ address: 0x10000100, data: pattern(4) }]));

    expect(error.code).toBe("INVALID_OPERATION");
    expect(error.message).toBe("Image writes to read-only FICR at 0x10000100");
  });

  it("refuses block-protected flash", async () => {
    const { session } = await openSim(nrf52840(), {
      prepare: (t) => {
        // ACL[0]: 0x3000, one page, write protected
        t.poke(0x4001e800, 0x3000);
        t.poke(0x4001e804, 0x1000);
        t.poke(0x4001e808, 0x2);
      },
    });

    const error = failure(await session.program([{ address: 0x3004, data: pattern(4) }]));

    expect(error.code).toBe("BLOCK_PROTECT_DENIED");
    expect(error.message).toBe("Flash at 0x00003004 is covered by block protection");
  });
});
