import { createCipheriv, createDecipheriv } from 'crypto';
import { MalformedResponseError } from '../errors/streamer-errors.js';

/**
 * Broadlink LAN protocol framing.
 *
 * Every packet is a 0x38 byte header followed by an AES-128-CBC encrypted
 * payload (zero padded, no PKCS padding). Multi-byte header fields are little
 * endian.
 *
 *   0x00  magic 5a a5 aa 55 5a a5 aa 55
 *   0x20  checksum of the whole packet (computed with this field zeroed)
 *   0x22  error code (responses, signed)
 *   0x24  device type
 *   0x26  command
 *   0x28  packet count
 *   0x2a  device MAC, reversed
 *   0x30  session id from auth
 *   0x34  checksum of the plain payload
 */

export const HEADER_LENGTH = 0x38;
export const MAGIC = Buffer.from('5aa5aa555aa5aa55', 'hex');
export const DEFAULT_KEY = Buffer.from('097628343fe99e23765c1513accf8b02', 'hex');
export const DEFAULT_IV = Buffer.from('562e17996d093d28ddb3ba695a2e6f58', 'hex');

export const COMMAND_AUTH = 0x65;
export const COMMAND_DATA = 0x6a;
export const DATA_SEND = 0x02;

/** Error code a device returns when the session key is no longer valid */
export const AUTH_ERROR = -7;

// Device types that wrap data commands in a length-prefixed frame
const RM4_DEVTYPES = new Set([
  0x51da, 0x5209, 0x520b, 0x520c, 0x520d, 0x5211, 0x5212, 0x5213, 0x5216,
  0x5f36, 0x6026, 0x6070, 0x610e, 0x610f, 0x6184, 0x62bc, 0x62be, 0x6364,
  0x648d, 0x649b, 0x6508, 0x6539, 0x653a, 0x653c
]);

export interface PacketHeader {
  devtype: number;
  command: number;
  count: number;
  /** Device MAC in display order; reversed on the wire */
  mac: Buffer;
  id: number;
  /** Only set on responses */
  errorCode?: number;
}

export interface DecodedPacket extends PacketHeader {
  errorCode: number;
  payload: Buffer;
}

export interface AuthResult {
  id: number;
  key: Buffer;
}

export function isRm4(devtype: number): boolean {
  return RM4_DEVTYPES.has(devtype);
}

export function checksum(data: Buffer, seed = 0xbeaf): number {
  let sum = seed;
  for (const byte of data) {
    sum += byte;
  }
  return sum & 0xffff;
}

function padToBlock(data: Buffer): Buffer {
  const padding = (16 - (data.length % 16)) % 16;
  return padding === 0 ? data : Buffer.concat([data, Buffer.alloc(padding)]);
}

export function encrypt(payload: Buffer, key: Buffer, iv: Buffer = DEFAULT_IV): Buffer {
  const cipher = createCipheriv('aes-128-cbc', key, iv);
  cipher.setAutoPadding(false);
  return Buffer.concat([cipher.update(padToBlock(payload)), cipher.final()]);
}

export function decrypt(data: Buffer, key: Buffer, iv: Buffer = DEFAULT_IV): Buffer {
  const decipher = createDecipheriv('aes-128-cbc', key, iv);
  decipher.setAutoPadding(false);
  return Buffer.concat([decipher.update(data), decipher.final()]);
}

/**
 * "aa:bb:cc:dd:ee:ff" (or without separators) to 6 bytes
 */
export function parseMac(mac: string | undefined): Buffer {
  if (!mac) {
    return Buffer.alloc(6);
  }
  const hex = mac.replace(/[^0-9a-fA-F]/g, '');
  if (hex.length !== 12) {
    throw new Error(`Invalid MAC address: ${mac}`);
  }
  return Buffer.from(hex, 'hex');
}

export function encodePacket(header: PacketHeader, payload: Buffer, key: Buffer, iv: Buffer = DEFAULT_IV): Buffer {
  const packet = Buffer.alloc(HEADER_LENGTH);
  MAGIC.copy(packet, 0);
  packet.writeInt16LE(header.errorCode ?? 0, 0x22);
  packet.writeUInt16LE(header.devtype & 0xffff, 0x24);
  packet.writeUInt16LE(header.command & 0xffff, 0x26);
  packet.writeUInt16LE(header.count & 0xffff, 0x28);
  Buffer.from(header.mac).reverse().copy(packet, 0x2a, 0, 6);
  packet.writeUInt32LE(header.id >>> 0, 0x30);
  packet.writeUInt16LE(checksum(payload), 0x34);

  const full = Buffer.concat([packet, encrypt(payload, key, iv)]);
  full.writeUInt16LE(checksum(full), 0x20);
  return full;
}

/**
 * Decode a packet received from a device. The payload is decrypted with `key`
 * even when the error code is set; callers check `errorCode` first.
 */
export function decodePacket(packet: Buffer, key: Buffer, iv: Buffer = DEFAULT_IV): DecodedPacket {
  if (packet.length < HEADER_LENGTH) {
    throw new MalformedResponseError('Broadlink', 'decode', `Packet too short: ${packet.length} bytes`);
  }
  if (!packet.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new MalformedResponseError('Broadlink', 'decode', 'Packet does not start with the Broadlink magic');
  }

  const declared = packet.readUInt16LE(0x20);
  const zeroed = Buffer.from(packet);
  zeroed.writeUInt16LE(0, 0x20);
  if (checksum(zeroed) !== declared) {
    throw new MalformedResponseError('Broadlink', 'decode', 'Packet checksum mismatch');
  }

  const body = packet.subarray(HEADER_LENGTH);
  if (body.length % 16 !== 0) {
    throw new MalformedResponseError('Broadlink', 'decode', `Encrypted payload is not block aligned (${body.length} bytes)`);
  }

  return {
    errorCode: packet.readInt16LE(0x22),
    devtype: packet.readUInt16LE(0x24),
    command: packet.readUInt16LE(0x26),
    count: packet.readUInt16LE(0x28),
    mac: Buffer.from(packet.subarray(0x2a, 0x30)).reverse(),
    id: packet.readUInt32LE(0x30),
    payload: body.length > 0 ? decrypt(body, key, iv) : Buffer.alloc(0)
  };
}

export function authPayload(): Buffer {
  const payload = Buffer.alloc(0x50);
  payload.fill(0x31, 0x04, 0x14);
  payload[0x1e] = 0x01;
  payload[0x2d] = 0x01;
  payload.write('Test 1', 0x30, 'ascii');
  return payload;
}

export function parseAuthResponse(payload: Buffer): AuthResult {
  if (payload.length < 0x14) {
    throw new MalformedResponseError('Broadlink', 'auth', `Auth response too short: ${payload.length} bytes`);
  }
  return {
    id: payload.readUInt32LE(0),
    key: Buffer.from(payload.subarray(0x04, 0x14))
  };
}

/**
 * Payload of a send_data request. RM4 devices prefix the command with the
 * length of everything after the length field.
 */
export function sendDataPayload(code: Buffer, rm4: boolean): Buffer {
  if (rm4) {
    const head = Buffer.alloc(6);
    head.writeUInt16LE(code.length + 4, 0);
    head.writeUInt32LE(DATA_SEND, 2);
    return Buffer.concat([head, code]);
  }
  const head = Buffer.alloc(4);
  head.writeUInt32LE(DATA_SEND, 0);
  return Buffer.concat([head, code]);
}

/**
 * Decode a configured code: "b64:<base64>" or bare base64
 */
export function decodeCode(value: string): Buffer {
  const base64 = value.startsWith('b64:') ? value.slice(4) : value;
  const code = Buffer.from(base64.trim(), 'base64');
  if (code.length === 0) {
    throw new Error('Empty remote code');
  }
  return code;
}

/**
 * Next packet counter value; the high bit stays set
 */
export function nextCount(count: number): number {
  return ((count + 1) | 0x8000) & 0xffff;
}
