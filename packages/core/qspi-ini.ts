import { readFile } from "fs/promises";
import type { QspiInstruction, QspiParams } from "./qspi.js";
import { createError } from "./types.js";
import { parseQspiParams, qspiParamsSchema } from "./qspi.js";

const SECTION = "DEFAULT_CONFIGURATION";

type PinName = "csn" | "sck" | "dio0" | "dio1" | "dio2" | "dio3";
type NumberKey = "memSize" | "sckDelay" | "wipIndex" | "rxDelay";
type NameKey = "readMode" | "writeMode" | "addressMode" | "frequency" | "spiMode" | "io2Level" | "io3Level" | "ppSize";

type IniField =
  | { kind: "number"; key: NumberKey }
  | { kind: "name"; key: NameKey }
  | { kind: "pin"; pin: PinName; part: "pin" | "port" }
  | { kind: "instruction" };

const FIELDS: Record<string, IniField> = {
  MemSize: { kind: "number", key: "memSize" },
  SckDelay: { kind: "number", key: "sckDelay" },
  WIPIndex: { kind: "number", key: "wipIndex" },
  RxDelay: { kind: "number", key: "rxDelay" },
  ReadMode: { kind: "name", key: "readMode" },
  WriteMode: { kind: "name", key: "writeMode" },
  AddressMode: { kind: "name", key: "addressMode" },
  Frequency: { kind: "name", key: "frequency" },
  SpiMode: { kind: "name", key: "spiMode" },
  CustomInstructionIO2Level: { kind: "name", key: "io2Level" },
  CustomInstructionIO3Level: { kind: "name", key: "io3Level" },
  PPSize: { kind: "name", key: "ppSize" },
  CSNPin: { kind: "pin", pin: "csn", part: "pin" },
  CSNPort: { kind: "pin", pin: "csn", part: "port" },
  SCKPin: { kind: "pin", pin: "sck", part: "pin" },
  SCKPort: { kind: "pin", pin: "sck", part: "port" },
  DIO0Pin: { kind: "pin", pin: "dio0", part: "pin" },
  DIO0Port: { kind: "pin", pin: "dio0", part: "port" },
  DIO1Pin: { kind: "pin", pin: "dio1", part: "pin" },
  DIO1Port: { kind: "pin", pin: "dio1", part: "port" },
  DIO2Pin: { kind: "pin", pin: "dio2", part: "pin" },
  DIO2Port: { kind: "pin", pin: "dio2", part: "port" },
  DIO3Pin: { kind: "pin", pin: "dio3", part: "pin" },
  DIO3Port: { kind: "pin", pin: "dio3", part: "port" },
  InitializationCustomInstruction: { kind: "instruction" },
};

function lineError(line: number, message: string) {
  return createError("INVALID_PARAMETER", `QSPI configuration line ${line}: ${message}`);
}

function parseNumber(text: string, line: number): number {
  const value = text.trim();
  if (/^0x[0-9a-f]+$/i.test(value)) {
    return parseInt(value.slice(2), 16);
  }
  if (/^\d+$/.test(value)) {
    return parseInt(value, 10);
  }
  throw lineError(line, `"${value}" is not a number`);
}

// "0x06" or "0x01, [0x40, 0x00]"
function parseInstruction(text: string, line: number): QspiInstruction {
  const match = /^([^,[\]]+)(?:,\s*\[([^\]]*)\])?$/.exec(text.trim());
  if (!match) {
    throw lineError(line, `"${text.trim()}" is not a custom instruction`);
  }
  const opcode = parseNumber(match[1] ?? "", line);
  const list = (match[2] ?? "").trim();
  const data = list === "" ? [] : list.split(",").map((item) => parseNumber(item, line));
  return { opcode, data };
}

/**
 * Parse the `[DEFAULT_CONFIGURATION]` section of a QSPI .ini file. Keys not
 * listed above, malformed values and keys outside the section are rejected.
 */
export function parseQspiIni(text: string): QspiParams {
  const defaults = qspiParamsSchema.parse({});
  const values: Record<string, unknown> = {};
  const pins: Record<PinName, { pin: number; port: number }> = {
    csn: { ...defaults.csn },
    sck: { ...defaults.sck },
    dio0: { ...defaults.dio0 },
    dio1: { ...defaults.dio1 },
    dio2: { ...defaults.dio2 },
    dio3: { ...defaults.dio3 },
  };
  const instructions: QspiInstruction[] = [];
  let inSection = false;

  text.split(/\r?\n/).forEach((raw, index) => {
    const lineNumber = index + 1;
    const line = raw.trim();
    if (line === "" || line.startsWith(";") || line.startsWith("#")) {
      return;
    }

    const section = /^\[(.+)\]$/.exec(line);
    if (section) {
      if (section[1]?.trim() !== SECTION) {
        throw lineError(lineNumber, `unknown section [${section[1]}]`);
      }
      inSection = true;
      return;
    }

    const separator = line.indexOf("=");
    if (separator < 0) {
      throw lineError(lineNumber, `expected key = value`);
    }
    if (!inSection) {
      throw lineError(lineNumber, `key outside [${SECTION}]`);
    }

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();
    const field = FIELDS[key];
    if (!field) {
      throw lineError(lineNumber, `unknown key ${key}`);
    }

    switch (field.kind) {
      case "number":
        values[field.key] = parseNumber(value, lineNumber);
        break;
      case "name":
        values[field.key] = value.toUpperCase();
        break;
      case "pin":
        pins[field.pin][field.part] = parseNumber(value, lineNumber);
        break;
      case "instruction":
        instructions.push(parseInstruction(value, lineNumber));
        break;
    }
  });

  return parseQspiParams({ ...values, ...pins, initInstructions: instructions });
}

export async function readQspiIni(path: string): Promise<QspiParams> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    throw createError("INVALID_PARAMETER", `Could not read QSPI configuration ${path}`, { cause: e });
  }
  return parseQspiIni(text);
}
