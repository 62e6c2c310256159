// src/services/list-services.ts

import { EipFrameDecodeError } from '../errors.js';
import type { PacketItem, ServiceItem } from '../types/eip-types.js';
import { decodeUtf8, encodeUtf8, viewOf } from '../utils/utils.js';

const NAME_SIZE = 16;
const ITEM_SIZE = 4 + NAME_SIZE; // version (2) + capability flags (2) + name

/** Бит 5: поддержка инкапсуляции CIP по TCP */
export const CAPABILITY_CIP_OVER_TCP = 1 << 5;

/**
 * Разбирает элемент ответа List Services (0x0100)
 */
export function parseServiceItem(item: PacketItem): ServiceItem {
  if (item.data.length < ITEM_SIZE) {
    throw new EipFrameDecodeError(
      `Service item too short: ${item.data.length} bytes, expected ${ITEM_SIZE}`
    );
  }
  const view = viewOf(item.data);
  return {
    typeId: item.typeId,
    protocolVersion: view.getUint16(0, true),
    capabilityFlags: view.getUint16(2, true),
    name: decodeUtf8(item.data.subarray(4, ITEM_SIZE)).replace(/\0+$/, ''),
  };
}

/**
 * Собирает элемент ответа List Services, имя дополняется нулями до 16 байт
 */
export function encodeServiceItem(service: ServiceItem): PacketItem {
  const name = encodeUtf8(service.name);
  if (name.length > NAME_SIZE) {
    throw new RangeError(`Service name too long: ${name.length} bytes`);
  }
  const data = new Uint8Array(ITEM_SIZE);
  const view = new DataView(data.buffer);
  view.setUint16(0, service.protocolVersion, true);
  view.setUint16(2, service.capabilityFlags, true);
  data.set(name, 4);
  return { typeId: service.typeId, data };
}
