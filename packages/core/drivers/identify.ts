import type { DeviceFamily } from "../types.js";
import type { ProbeTransport } from "../transport.js";
import type { DeviceDriver, DriverContext } from "./driver.js";
import { AP_IDR, DP_IDR } from "../transport.js";
import { CTRL_AP_IDR_VALUE as NRF52_CTRL_AP_IDR } from "./nrf52.js";
import { M33_CTRL_AP_IDR } from "./m33.js";
import { Nrf51Driver } from "./nrf51.js";
import { Nrf52Driver } from "./nrf52.js";
import { Nrf53Driver } from "./nrf53.js";
import { Nrf91Driver } from "./nrf91.js";
import { UnknownDriver } from "./unknown.js";

// Debug port IDR values by core
export const DP_IDR_CORTEX_M0 = 0x0bb11477;
export const DP_IDR_CORTEX_M4 = 0x2ba01477;
export const DP_IDR_CORTEX_M33 = 0x6ba02477;

/**
 * Identify the device family from the DP IDR, telling nRF53 and nRF91 apart
 * by where their CTRL-AP sits. Debug power must already be up.
 */
export async function detectFamily(transport: ProbeTransport): Promise<DeviceFamily> {
  const idr = (await transport.readDebugPort(DP_IDR)) >>> 0;

  switch (idr) {
    case DP_IDR_CORTEX_M0:
      return "NRF51";
    case DP_IDR_CORTEX_M4: {
      const ctrlAp = await transport.readAccessPort(1, AP_IDR);
      return ctrlAp >>> 0 === NRF52_CTRL_AP_IDR ? "NRF52" : "UNKNOWN";
    }
    case DP_IDR_CORTEX_M33: {
      if ((await transport.readAccessPort(4, AP_IDR)) >>> 0 === M33_CTRL_AP_IDR) {
        return "NRF91";
      }
      if ((await transport.readAccessPort(2, AP_IDR)) >>> 0 === M33_CTRL_AP_IDR) {
        return "NRF53";
      }
      return "UNKNOWN";
    }
    default:
      return "UNKNOWN";
  }
}

export function createDriver(family: DeviceFamily, context: DriverContext): DeviceDriver {
  switch (family) {
    case "NRF51":
      return new Nrf51Driver(context);
    case "NRF52":
      return new Nrf52Driver(context);
    case "NRF53":
      return new Nrf53Driver(context);
    case "NRF91":
      return new Nrf91Driver(context);
    case "UNKNOWN":
      return new UnknownDriver();
  }
}
