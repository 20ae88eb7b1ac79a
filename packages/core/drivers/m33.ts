import type { ProtectionState } from "../types.js";
import type { ProbeTransport } from "../transport.js";
import { CTRL_AP_APPROTECTSTATUS, CTRL_AP_ERASEPROTECTSTATUS } from "./nrf-base.js";

// FICR INFO block offsets on the nRF53/nRF91 families
const FICR_INFO_PART = 0x20c;
const FICR_INFO_VARIANT = 0x210;
const FICR_INFO_RAM = 0x218;
const FICR_INFO_FLASH = 0x21c;
const FICR_CODEPAGESIZE = 0x220;
const FICR_CODESIZE = 0x224;

export const M33_CTRL_AP_IDR = 0x12880000;

// APPROTECTSTATUS bits read 1 while the matching protection is disabled
const STATUS_APPROTECT = 1 << 0;
const STATUS_SECUREAPPROTECT = 1 << 1;

export interface FicrInfo {
  part: number;
  variant: number;
  ramSize: number;
  flashSize: number;
  codePageSize: number;
  codePages: number;
}

export async function readFicrInfo(transport: ProbeTransport, ficrBase: number): Promise<FicrInfo> {
  return {
    part: await transport.readU32(ficrBase + FICR_INFO_PART),
    variant: await transport.readU32(ficrBase + FICR_INFO_VARIANT),
    ramSize: (await transport.readU32(ficrBase + FICR_INFO_RAM)) * 1024,
    flashSize: (await transport.readU32(ficrBase + FICR_INFO_FLASH)) * 1024,
    codePageSize: await transport.readU32(ficrBase + FICR_CODEPAGESIZE),
    codePages: await transport.readU32(ficrBase + FICR_CODESIZE),
  };
}

export async function readCtrlApProtection(
  transport: ProbeTransport,
  ctrlAp: number,
  hasSecure: boolean,
): Promise<ProtectionState> {
  const status = await transport.readAccessPort(ctrlAp, CTRL_AP_APPROTECTSTATUS);
  if (!(status & STATUS_APPROTECT)) {
    return "ALL";
  }
  if (hasSecure && !(status & STATUS_SECUREAPPROTECT)) {
    return "SECURE_ONLY";
  }
  return "NONE";
}

export async function readEraseProtectStatus(transport: ProbeTransport, ctrlAp: number): Promise<boolean> {
  return ((await transport.readAccessPort(ctrlAp, CTRL_AP_ERASEPROTECTSTATUS)) & 1) !== 0;
}
