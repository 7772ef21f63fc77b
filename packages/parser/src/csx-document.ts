/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CSX document reader
 *
 * Layout:
 *   ConstructorScene
 *     DetailLevels/DetailLevel*
 *       InteriorMap @brushScale @lightScale @ambientColor @ambientColorEmerg
 *         Entities/Entity* @id @classname @gametype @origin
 *           Properties @key=value...
 *         Brushes/Brush* @id @owner @type @transform
 *           Vertices/Vertex* @pos
 *           Face* @id @material @texgens @texDiv
 *             Indices @indices
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedInputError, createLogger, type ErrorContext } from '@csxdif/data';
import type { Plane, Vec3 } from '@csxdif/geometry';
import type { CsxBrush, CsxEntity, CsxFace, CsxInteriorMap, CsxScene, CsxTexGen } from './types.js';

const log = createLogger('CsxReader');

const ATTR = '@_';

const IDENTITY = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
const BLACK: Vec3 = { x: 0, y: 0, z: 0 };

const REPEATED_ELEMENTS = new Set(['DetailLevel', 'Entity', 'Brush', 'Vertex', 'Face']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR,
  parseAttributeValue: false,
  parseTagValue: false,
  isArray: (name) => REPEATED_ELEMENTS.has(name),
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: XmlNode, name: string): XmlNode | undefined {
  const value = node[name];
  return isNode(value) ? value : undefined;
}

function children(node: XmlNode | undefined, name: string): XmlNode[] {
  if (!node) return [];
  const value = node[name];
  return Array.isArray(value) ? value.filter(isNode) : [];
}

function attribute(node: XmlNode, name: string): string | undefined {
  const value = node[ATTR + name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Reads typed attributes off one element, failing with the element's identity
 */
class AttributeReader {
  constructor(
    private readonly node: XmlNode,
    private readonly element: string,
    private readonly context: ErrorContext = {}
  ) {}

  string(name: string, fallback?: string): string {
    const value = attribute(this.node, name);
    if (value !== undefined) return value;
    if (fallback !== undefined) return fallback;
    throw this.fail(`missing attribute "${name}"`);
  }

  numbers(name: string, count?: number, fallback?: number[]): number[] {
    const raw = attribute(this.node, name);
    if (raw === undefined) {
      if (fallback !== undefined) return fallback;
      throw this.fail(`missing attribute "${name}"`);
    }
    const trimmed = raw.trim();
    const values = trimmed.length === 0 ? [] : trimmed.split(/\s+/).map(Number);
    if (values.some((v) => !Number.isFinite(v))) {
      throw this.fail(`attribute "${name}" is not numeric: "${raw}"`);
    }
    if (count !== undefined && values.length < count) {
      throw this.fail(`attribute "${name}" needs ${count} numbers, got ${values.length}`);
    }
    return values;
  }

  integer(name: string, fallback?: number): number {
    const [value] = this.numbers(name, 1, fallback === undefined ? undefined : [fallback]);
    if (!Number.isInteger(value)) {
      throw this.fail(`attribute "${name}" is not an integer: ${value}`);
    }
    return value;
  }

  point(name: string, fallback?: Vec3): Vec3 {
    const values = this.numbers(name, 3, fallback ? [fallback.x, fallback.y, fallback.z] : undefined);
    return { x: values[0], y: values[1], z: values[2] };
  }

  optionalPoint(name: string): Vec3 | undefined {
    const raw = attribute(this.node, name);
    if (raw === undefined || raw.trim().length === 0) return undefined;
    return this.point(name);
  }

  fail(reason: string): MalformedInputError {
    return new MalformedInputError(`Invalid <${this.element}>: ${reason}`, undefined, this.context);
  }
}

function plane(values: number[], offset: number): Plane {
  return {
    normal: { x: values[offset], y: values[offset + 1], z: values[offset + 2] },
    distance: values[offset + 3],
  };
}

function readTexGen(reader: AttributeReader): CsxTexGen {
  const values = reader.numbers('texgens', 11);
  return {
    planeX: plane(values, 0),
    planeY: plane(values, 4),
    rot: values[8],
    scale: [values[9], values[10]],
  };
}

function readFace(node: XmlNode, brushId: number, vertexCount: number): CsxFace {
  const reader = new AttributeReader(node, 'Face', { brushId });
  const id = reader.integer('id', 0);
  const faceReader = new AttributeReader(node, 'Face', { brushId, faceId: id });

  const texGen = readTexGen(faceReader);
  const texDiv = faceReader.numbers('texDiv', 2, [1, 1]);

  const indicesNode = child(node, 'Indices');
  const indices = indicesNode
    ? new AttributeReader(indicesNode, 'Indices', { brushId, faceId: id }).numbers('indices')
    : [];
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= vertexCount) {
      throw faceReader.fail(`vertex index ${index} out of range 0..${vertexCount - 1}`);
    }
  }

  return {
    id,
    material: faceReader.string('material', ''),
    texGen,
    texDiv: [texDiv[0], texDiv[1]],
    indices,
  };
}

function readBrush(node: XmlNode): CsxBrush {
  const reader = new AttributeReader(node, 'Brush');
  const id = reader.integer('id');
  const brushReader = new AttributeReader(node, 'Brush', { brushId: id });

  const transform = brushReader.numbers('transform', 16, IDENTITY);
  const vertices = children(child(node, 'Vertices'), 'Vertex').map((v) =>
    new AttributeReader(v, 'Vertex', { brushId: id }).point('pos')
  );
  const faces = children(node, 'Face').map((f) => readFace(f, id, vertices.length));

  return {
    id,
    owner: brushReader.integer('owner', 0),
    type: brushReader.integer('type', 0),
    transform: transform.slice(0, 16),
    vertices,
    faces,
  };
}

function readProperties(node: XmlNode | undefined): Map<string, string> {
  const properties = new Map<string, string>();
  if (!node) return properties;
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith(ATTR) && typeof value === 'string') {
      properties.set(key.slice(ATTR.length), value);
    }
  }
  return properties;
}

function readEntity(node: XmlNode, order: number): CsxEntity {
  const reader = new AttributeReader(node, 'Entity');
  const id = reader.integer('id');
  const entityReader = new AttributeReader(node, 'Entity', { entityId: id });
  return {
    id,
    classname: entityReader.string('classname'),
    gametype: entityReader.string('gametype', ''),
    origin: entityReader.optionalPoint('origin'),
    properties: readProperties(child(node, 'Properties')),
    order,
  };
}

function readInteriorMap(node: XmlNode, firstEntityOrder: number): CsxInteriorMap {
  const reader = new AttributeReader(node, 'InteriorMap');
  return {
    brushScale: reader.numbers('brushScale', 1, [32])[0],
    lightScale: reader.numbers('lightScale', 1, [8])[0],
    ambientColor: reader.point('ambientColor', BLACK),
    ambientColorEmerg: reader.point('ambientColorEmerg', BLACK),
    entities: children(child(node, 'Entities'), 'Entity').map((e, i) => readEntity(e, firstEntityOrder + i)),
    brushes: children(child(node, 'Brushes'), 'Brush').map(readBrush),
  };
}

/**
 * Parse a CSX document.
 *
 * @throws MalformedInputError when the XML is unreadable, the root is not
 * `ConstructorScene` or a numeric attribute cannot be read
 */
export function parseCsx(input: string | Uint8Array): CsxScene {
  const text = typeof input === 'string' ? input : new TextDecoder('utf-8').decode(input);

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new MalformedInputError('CSX document is not well-formed XML', `${msg} (line ${line}, column ${col})`);
  }

  const document: unknown = parser.parse(text);
  const root = isNode(document) ? child(document, 'ConstructorScene') : undefined;
  if (!root) {
    throw new MalformedInputError('CSX document has no <ConstructorScene> root');
  }

  const sceneReader = new AttributeReader(root, 'ConstructorScene');
  const detailLevels: CsxInteriorMap[] = [];
  let entityOrder = 0;
  for (const level of children(child(root, 'DetailLevels'), 'DetailLevel')) {
    const map = child(level, 'InteriorMap');
    if (!map) {
      throw new MalformedInputError('<DetailLevel> has no <InteriorMap>');
    }
    const interiorMap = readInteriorMap(map, entityOrder);
    entityOrder += interiorMap.entities.length;
    detailLevels.push(interiorMap);
  }

  if (detailLevels.length === 0) {
    throw new MalformedInputError('CSX document has no detail levels');
  }

  const scene: CsxScene = {
    version: sceneReader.numbers('version', 1, [0])[0],
    creator: sceneReader.string('creator', ''),
    detailLevels,
  };

  log.info('Parsed scene', {
    operation: 'parseCsx',
    data: {
      detailLevels: detailLevels.length,
      brushes: detailLevels.reduce((sum, d) => sum + d.brushes.length, 0),
      entities: entityOrder,
    },
  });

  return scene;
}
