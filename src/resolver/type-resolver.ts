// src/resolver/type-resolver.ts

import { CipClass, CipDataType } from '../constants/constants.js';
import { dataTypeName, isElementaryType } from '../cip/data-types.js';
import { EipChainTooLongError, EipUnresolvedTypeError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import { parseTagName, parseTagNameServerInfo } from '../object-model/tag-name-server.js';
import { parseVariableObject } from '../object-model/variable-object.js';
import {
  parseVariableTypeObject,
  type VariableTypeObjectAttributes,
} from '../object-model/variable-type-object.js';
import type {
  AttributeReader,
  CipTypeDescriptor,
  StructureDescriptor,
  StructureMember,
  TypeResolverOptions,
  UnresolvedVariable,
  VariableEntry,
} from '../types/eip-types.js';

export const DEFAULT_MAX_CHAIN_LENGTH = 1024;
export const DEFAULT_MAX_NESTING_DEPTH = 16;

const logger = defaultLogger.createLogger('TypeResolver');

/** Общие атрибуты Variable Object и Variable Type Object, нужные для построения дескриптора */
interface TypeAttributes {
  instanceId: number;
  dataType: number;
  arrayDataType: number;
  size: number;
  extents: number[];
  starts: number[];
  /** Для массива - Variable Type Object элемента, 0 если его нет */
  typeInstanceId: number;
}

export interface DiscoveryResult {
  entries: VariableEntry[];
  unresolved: UnresolvedVariable[];
}

/**
 * Обнаружение переменных и разрешение их типов по объектной модели контроллера:
 * Tag Name Server (0x6A) -> Variable Object (0x6B) -> Variable Type Object (0x6C).
 */
export class TypeResolver {
  private readonly reader: AttributeReader;
  private readonly maxChainLength: number;
  private readonly maxNestingDepth: number;

  constructor(reader: AttributeReader, options: TypeResolverOptions = {}) {
    this.reader = reader;
    this.maxChainLength = options.maxChainLength ?? DEFAULT_MAX_CHAIN_LENGTH;
    this.maxNestingDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
  }

  /**
   * Имена переменных в порядке экземпляров 1..N
   */
  async listVariableNames(): Promise<string[]> {
    const info = parseTagNameServerInfo(
      await this.reader.getAttributeAll(CipClass.TAG_NAME_SERVER, 0)
    );
    logger.debug(`Tag Name Server reports ${info.instanceCount} variables`);

    const names: string[] = [];
    for (let instanceId = 1; instanceId <= info.instanceCount; instanceId++) {
      const data = await this.reader.getAttributeAll(CipClass.TAG_NAME_SERVER, instanceId);
      names.push(parseTagName(data));
    }
    return names;
  }

  /**
   * Полный проход обнаружения. Переменные с неразрешимым типом
   * попадают в unresolved, остальные ошибки прерывают проход.
   */
  async discover(): Promise<DiscoveryResult> {
    const names = await this.listVariableNames();
    const entries: VariableEntry[] = [];
    const unresolved: UnresolvedVariable[] = [];

    for (const [index, name] of names.entries()) {
      const instanceId = index + 1;
      try {
        entries.push({ name, instanceId, type: await this.resolveVariable(instanceId) });
      } catch (err: unknown) {
        if (!(err instanceof EipUnresolvedTypeError)) throw err;
        logger.warn(`Variable left unresolved: ${err.message}`, { variable: name });
        unresolved.push({ name, instanceId, dataType: err.dataType, reason: err.message });
      }
    }

    logger.info(`Discovered ${entries.length} variables, ${unresolved.length} unresolved`);
    return { entries, unresolved };
  }

  /**
   * Разрешает тип переменной по экземпляру Variable Object
   * @throws EipUnresolvedTypeError - для сокращённых структур, объединений и неизвестных кодов
   * @throws EipChainTooLongError - при слишком длинной цепочке членов или глубокой вложенности
   */
  async resolveVariable(instanceId: number): Promise<CipTypeDescriptor> {
    const attributes = parseVariableObject(
      await this.reader.getAttributeAll(CipClass.VARIABLE_OBJECT, instanceId)
    );
    const descriptor = await this.fromAttributes(
      {
        instanceId,
        dataType: attributes.dataType,
        arrayDataType: attributes.arrayDataType,
        size: attributes.size,
        extents: attributes.extents,
        starts: attributes.starts,
        typeInstanceId: attributes.variableTypeInstanceId,
      },
      0
    );

    const target = descriptor.kind === 'array' ? descriptor.elementType : descriptor;
    if (target.kind === 'abbreviated-structure') {
      throw new EipUnresolvedTypeError(
        CipDataType.ABBREVIATED_STRUCT,
        'abbreviated structure member chains are not resolved'
      );
    }
    return descriptor;
  }

  /**
   * Разрешает тип по экземпляру Variable Type Object
   */
  async resolveTypeInstance(instanceId: number, depth: number = 0): Promise<CipTypeDescriptor> {
    this.checkDepth(depth, instanceId);
    return this.fromTypeObject(await this.readTypeObject(instanceId), instanceId, depth);
  }

  private async readTypeObject(instanceId: number): Promise<VariableTypeObjectAttributes> {
    return parseVariableTypeObject(
      await this.reader.getAttributeAll(CipClass.VARIABLE_TYPE_OBJECT, instanceId)
    );
  }

  private checkDepth(depth: number, instanceId: number): void {
    if (depth > this.maxNestingDepth) {
      throw new EipChainTooLongError(this.maxNestingDepth, instanceId);
    }
  }

  private async fromTypeObject(
    vto: VariableTypeObjectAttributes,
    instanceId: number,
    depth: number
  ): Promise<CipTypeDescriptor> {
    if (vto.dataType === CipDataType.STRUCT) {
      return this.buildStructure(vto, instanceId, vto.sizeInMemory, depth);
    }
    if (vto.dataType === CipDataType.ARRAY && vto.arrayDataType === CipDataType.STRUCT) {
      const count = vto.extents.reduce((total, extent) => total * extent, 1);
      return {
        kind: 'array',
        instanceId,
        size: vto.sizeInMemory,
        elementType: await this.buildStructure(
          vto,
          instanceId,
          count > 0 ? vto.sizeInMemory / count : 0,
          depth
        ),
        dimensions: vto.extents.map((extent, i) => ({ extent, start: vto.starts[i] })),
      };
    }
    return this.fromAttributes(
      {
        instanceId,
        dataType: vto.dataType,
        arrayDataType: vto.arrayDataType,
        size: vto.sizeInMemory,
        extents: vto.extents,
        starts: vto.starts,
        typeInstanceId: 0,
      },
      depth
    );
  }

  private async fromAttributes(
    attributes: TypeAttributes,
    depth: number
  ): Promise<CipTypeDescriptor> {
    this.checkDepth(depth, attributes.instanceId);
    const { instanceId, dataType, size } = attributes;

    if (isElementaryType(dataType)) {
      return { kind: 'scalar', instanceId, size, code: dataType, width: size };
    }

    switch (dataType) {
      case CipDataType.STRING:
        return { kind: 'string', instanceId, size, maxSize: size };

      case CipDataType.ABBREVIATED_STRUCT:
        return { kind: 'abbreviated-structure', instanceId, size };

      case CipDataType.STRUCT: {
        if (attributes.typeInstanceId === 0) {
          throw new EipUnresolvedTypeError(dataType, 'structure without a variable type instance');
        }
        return this.resolveTypeInstance(attributes.typeInstanceId, depth + 1);
      }

      case CipDataType.ARRAY: {
        const count = attributes.extents.reduce((total, extent) => total * extent, 1);
        const elementType =
          attributes.typeInstanceId !== 0
            ? await this.resolveTypeInstance(attributes.typeInstanceId, depth + 1)
            : await this.fromAttributes(
                {
                  instanceId: 0,
                  dataType: attributes.arrayDataType,
                  arrayDataType: 0,
                  size: count > 0 ? size / count : 0,
                  extents: [],
                  starts: [],
                  typeInstanceId: 0,
                },
                depth + 1
              );
        return {
          kind: 'array',
          instanceId,
          size,
          elementType,
          dimensions: attributes.extents.map((extent, i) => ({
            extent,
            start: attributes.starts[i],
          })),
        };
      }

      default:
        throw new EipUnresolvedTypeError(
          dataType,
          `unsupported data type ${dataTypeName(dataType)}`
        );
    }
  }

  /**
   * Строит структуру: члены идут от nesting instance по next instance до 0.
   * Потолок цепочки - объявленное число членов, не больше maxChainLength.
   */
  private async buildStructure(
    vto: VariableTypeObjectAttributes,
    instanceId: number,
    size: number,
    depth: number
  ): Promise<StructureDescriptor> {
    const limit =
      vto.numberOfMembers > 0
        ? Math.min(vto.numberOfMembers, this.maxChainLength)
        : this.maxChainLength;
    const members: StructureMember[] = [];

    let memberId = vto.nestingInstanceId;
    while (memberId !== 0) {
      if (members.length >= limit) {
        throw new EipChainTooLongError(limit, instanceId);
      }
      this.checkDepth(depth + 1, memberId);
      const member = await this.readTypeObject(memberId);
      const type = await this.fromTypeObject(member, memberId, depth + 1);
      members.push({ name: member.name, type });
      memberId = member.nextInstanceId;
    }

    return {
      kind: 'structure',
      instanceId,
      size,
      typeName: vto.name,
      crc: vto.crc,
      members,
    };
  }
}
