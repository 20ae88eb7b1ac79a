import { describe, expect, it } from "vitest";
import type { SimTarget } from "./sim/target.js";
import { nrf52840 } from "./sim/profiles.js";
import { failure, openSim, value } from "./sim/harness.js";

const CONTROL_BLOCK = 0x20001000;
const NAME = 0x20002000;
const UP_BUFFER = 0x20003000;
const DOWN_BUFFER = 0x20003100;

const ascii = (text: string): Uint8Array => new TextEncoder().encode(text);

// One up channel of 16 bytes and one down channel of 8 bytes
function plantControlBlock(target: SimTarget, up: { wrOff: number; rdOff: number }, down = { wrOff: 0, rdOff: 0 }): void {
  target.loadBytes(CONTROL_BLOCK, ascii("SEGGER RTT\0"));
  target.poke(CONTROL_BLOCK + 16, 1);
  target.poke(CONTROL_BLOCK + 20, 1);
  target.loadBytes(NAME, ascii("Terminal\0"));

  const descriptors = [
    { at: CONTROL_BLOCK + 24, buffer: UP_BUFFER, size: 16, ...up },
    { at: CONTROL_BLOCK + 48, buffer: DOWN_BUFFER, size: 8, ...down },
  ];
  for (const { at, buffer, size, wrOff, rdOff } of descriptors) {
    target.poke(at, NAME);
    target.poke(at + 4, buffer);
    target.poke(at + 8, size);
    target.poke(at + 12, wrOff);
    target.poke(at + 16, rdOff);
  }
}

describe("RTT", () => {
  it("finds the control block by scanning RAM while the core runs", async () => {
    const { target, session } = await openSim(nrf52840(), {
      prepare: (t) => plantControlBlock(t, { wrOff: 0, rdOff: 0 }),
    });
    value(await session.go());

    value(await session.rttStart());
    expect(value(await session.isRttStarted())).toBe(true);
    expect(value(await session.rttIsControlBlockFound())).toBe(true);

    expect(target.coreHalted).toBe(false);
    expect(value(await session.rttChannelCount())).toEqual({ down: 1, up: 1 });
    expect(value(await session.rttChannelInfo(0, "UP"))).toEqual({
      direction: "UP",
      index: 0,
      name: "Terminal",
      size: 16,
    });
  });

  it("uses a fixed control block address", async () => {
    const { session } = await openSim(nrf52840(), {
      prepare: (t) => plantControlBlock(t, { wrOff: 0, rdOff: 0 }),
    });

    value(await session.rttSetControlBlockAddress(0x20000000));
    value(await session.rttStart());
    expect(value(await session.rttIsControlBlockFound())).toBe(false);
    value(await session.rttStop());

    value(await session.rttSetControlBlockAddress(CONTROL_BLOCK));
    value(await session.rttStart());
    expect(value(await session.rttIsControlBlockFound())).toBe(true);
  });

  it("drains an up channel across the wrap", async () => {
    const { target, session } = await openSim(nrf52840(), {
      prepare: (t) => {
        plantControlBlock(t, { wrOff: 2, rdOff: 12 });
        t.loadBytes(UP_BUFFER + 12, ascii("abcd"));
        t.loadBytes(UP_BUFFER, ascii("ef"));
      },
    });
    value(await session.rttStart());
    value(await session.rttIsControlBlockFound());

    const data = value(await session.rttRead(0, 100));

    expect(new TextDecoder().decode(data)).toBe("abcdef");
    expect(target.peek(CONTROL_BLOCK + 24 + 16)).toBe(2);
    expect(value(await session.rttRead(0, 100))).toEqual(new Uint8Array(0));
  });

  it("fills a down channel up to one byte short of its read offset", async () => {
    const { target, session } = await openSim(nrf52840(), {
      prepare: (t) => plantControlBlock(t, { wrOff: 0, rdOff: 0 }, { wrOff: 6, rdOff: 6 }),
    });
    value(await session.rttStart());
    value(await session.rttIsControlBlockFound());

    const written = value(await session.rttWrite(0, ascii("1234567890")));

    expect(written).toBe(7);
    expect(target.dumpBytes(DOWN_BUFFER, 8)).toEqual(new Uint8Array([0x33, 0x34, 0x35, 0x36, 0x37, 0x00, 0x31, 0x32]));
    expect(target.peek(CONTROL_BLOCK + 48 + 12)).toBe(5);
    expect(value(await session.rttWrite(0, ascii("x")))).toBe(0);
  });

  it("rejects channels that do not exist", async () => {
    const { session } = await openSim(nrf52840(), {
      prepare: (t) => plantControlBlock(t, { wrOff: 0, rdOff: 0 }),
    });
    value(await session.rttStart());
    value(await session.rttIsControlBlockFound());

    const error = failure(await session.rttChannelInfo(1, "UP"));

    expect(error.code).toBe("INVALID_PARAMETER");
    expect(error.message).toBe("RTT up channel 1 does not exist (1 available)");
  });

  it("rejects a descriptor whose offsets fall outside its buffer", async () => {
    const { target, session } = await openSim(nrf52840(), {
      prepare: (t) => plantControlBlock(t, { wrOff: 0, rdOff: 20 }),
    });
    value(await session.rttStart());
    value(await session.rttIsControlBlockFound());

    const error = failure(await session.rttRead(0, 4));
    expect(error.code).toBe("INVALID_OPERATION");
    expect(error.message).toBe("RTT up channel 0 has a corrupt descriptor (size 16, WrOff 0, RdOff 20)");

    target.poke(CONTROL_BLOCK + 48 + 8, 0);
    expect(failure(await session.rttWrite(0, ascii("x"))).message).toBe(
      "RTT down channel 0 has a corrupt descriptor (size 0, WrOff 0, RdOff 0)",
    );
  });

  it("stops serving channels once the device is protected", async () => {
    const { session } = await openSim(nrf52840(), {
      prepare: (t) => plantControlBlock(t, { wrOff: 0, rdOff: 0 }),
    });
    value(await session.rttStart());
    value(await session.rttIsControlBlockFound());

    value(await session.readbackProtect("ALL"));

    const error = failure(await session.rttRead(0, 4));
    expect(error.code).toBe("PROTECTION_DENIED");
    expect(error.message).toBe("Device is readback protected (ALL); recover it first");
    expect(failure(await session.rttWrite(0, ascii("x"))).code).toBe("PROTECTION_DENIED");
    expect(failure(await session.rttIsControlBlockFound()).code).toBe("PROTECTION_DENIED");
  });

  it("needs a start before searching and refuses a second start", async () => {
    const { session } = await openSim(nrf52840());

    expect(failure(await session.rttIsControlBlockFound()).message).toBe("RTT is not started");
    value(await session.rttStart());
    expect(failure(await session.rttStart()).message).toBe("RTT is already started");
    expect(failure(await session.rttChannelCount()).message).toBe("RTT control block has not been found");
  });

  it("clears the control block id on stop and stops only once", async () => {
    const { target, session } = await openSim(nrf52840(), {
      prepare: (t) => plantControlBlock(t, { wrOff: 0, rdOff: 0 }),
    });
    value(await session.rttStart());
    value(await session.rttIsControlBlockFound());

    value(await session.rttStop());
    value(await session.rttStop());

    expect(value(await session.isRttStarted())).toBe(false);
    expect(target.dumpBytes(CONTROL_BLOCK, 16)).toEqual(new Uint8Array(16));
  });
});
