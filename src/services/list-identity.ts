// src/services/list-identity.ts

import { EipFrameDecodeError } from '../errors.js';
import type { IdentityItem, SocketAddress } from '../types/eip-types.js';
import { decodeUtf8, encodeUtf8, viewOf } from '../utils/utils.js';

const SOCKET_ADDRESS_SIZE = 16;
const FIXED_PART_SIZE = 2 + SOCKET_ADDRESS_SIZE + 14; // version + sockaddr + vendor..serial
const MIN_ITEM_SIZE = FIXED_PART_SIZE + 2; // + name length + state

/**
 * Разбирает sockaddr (поля в big-endian, как в сетевом порядке)
 */
export function parseSocketAddress(bytes: Uint8Array, offset: number = 0): SocketAddress {
  const view = viewOf(bytes);
  return {
    family: view.getUint16(offset, false),
    port: view.getUint16(offset + 2, false),
    address: Array.from(bytes.subarray(offset + 4, offset + 8)).join('.'),
  };
}

export function encodeSocketAddress(address: SocketAddress): Uint8Array {
  const out = new Uint8Array(SOCKET_ADDRESS_SIZE);
  const view = new DataView(out.buffer);
  view.setUint16(0, address.family, false);
  view.setUint16(2, address.port, false);
  const octets = address.address.split('.').map(Number);
  if (octets.length !== 4 || octets.some(o => !Number.isInteger(o) || o < 0 || o > 255)) {
    throw new RangeError(`Invalid IPv4 address: ${address.address}`);
  }
  out.set(octets, 4);
  return out;
}

/**
 * Разбирает CIP Identity item (0x000C) из ответа List Identity
 * @throws EipFrameDecodeError - при обрезанных данных
 */
export function parseIdentityItem(data: Uint8Array): IdentityItem {
  if (data.length < MIN_ITEM_SIZE) {
    throw new EipFrameDecodeError(
      `Identity item too short: ${data.length} bytes, expected at least ${MIN_ITEM_SIZE}`
    );
  }
  const view = viewOf(data);
  const nameLength = data[FIXED_PART_SIZE];
  const nameEnd = FIXED_PART_SIZE + 1 + nameLength;
  if (data.length < nameEnd + 1) {
    throw new EipFrameDecodeError(`Identity item product name overruns the item`);
  }

  return {
    protocolVersion: view.getUint16(0, true),
    socketAddress: parseSocketAddress(data, 2),
    vendorId: view.getUint16(18, true),
    deviceType: view.getUint16(20, true),
    productCode: view.getUint16(22, true),
    revision: { major: data[24], minor: data[25] },
    status: view.getUint16(26, true),
    serialNumber: view.getUint32(28, true),
    productName: decodeUtf8(data.subarray(FIXED_PART_SIZE + 1, nameEnd)),
    state: data[nameEnd],
  };
}

/**
 * Собирает CIP Identity item (используется эмулятором контроллера)
 */
export function encodeIdentityItem(item: IdentityItem): Uint8Array {
  const name = encodeUtf8(item.productName);
  if (name.length > 0xff) {
    throw new RangeError(`Product name too long: ${name.length} bytes`);
  }
  const out = new Uint8Array(MIN_ITEM_SIZE + name.length);
  const view = new DataView(out.buffer);

  view.setUint16(0, item.protocolVersion, true);
  out.set(encodeSocketAddress(item.socketAddress), 2);
  view.setUint16(18, item.vendorId, true);
  view.setUint16(20, item.deviceType, true);
  view.setUint16(22, item.productCode, true);
  out[24] = item.revision.major;
  out[25] = item.revision.minor;
  view.setUint16(26, item.status, true);
  view.setUint32(28, item.serialNumber >>> 0, true);
  out[FIXED_PART_SIZE] = name.length;
  out.set(name, FIXED_PART_SIZE + 1);
  out[FIXED_PART_SIZE + 1 + name.length] = item.state;

  return out;
}
