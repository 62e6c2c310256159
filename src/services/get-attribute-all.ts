// src/services/get-attribute-all.ts

import { CipService } from '../constants/constants.js';
import { logicalPath } from '../cip/path-builder.js';
import type { CipRequest } from '../types/eip-types.js';

/**
 * Строит запрос Get Attribute All (0x01) к экземпляру класса
 */
export function buildGetAttributeAllRequest(classId: number, instanceId: number): CipRequest {
  return {
    service: CipService.GET_ATTRIBUTE_ALL,
    path: logicalPath(classId, instanceId),
    data: new Uint8Array(0),
  };
}
