/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CSX document writer - the inverse of parseCsx
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { Plane, Vec3 } from '@csxdif/geometry';
import type { CsxBrush, CsxEntity, CsxFace, CsxInteriorMap, CsxScene } from './types.js';

const ATTR = '@_';

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
});

function formatNumbers(values: readonly number[]): string {
  return values.map((v) => String(v)).join(' ');
}

function formatPoint(p: Vec3): string {
  return formatNumbers([p.x, p.y, p.z]);
}

function planeNumbers(p: Plane): number[] {
  return [p.normal.x, p.normal.y, p.normal.z, p.distance];
}

function faceNode(face: CsxFace): Record<string, unknown> {
  const { texGen } = face;
  return {
    [`${ATTR}id`]: String(face.id),
    [`${ATTR}material`]: face.material,
    [`${ATTR}texgens`]: formatNumbers([
      ...planeNumbers(texGen.planeX),
      ...planeNumbers(texGen.planeY),
      texGen.rot,
      ...texGen.scale,
    ]),
    [`${ATTR}texDiv`]: formatNumbers(face.texDiv),
    Indices: { [`${ATTR}indices`]: formatNumbers(face.indices) },
  };
}

function brushNode(brush: CsxBrush): Record<string, unknown> {
  return {
    [`${ATTR}id`]: String(brush.id),
    [`${ATTR}owner`]: String(brush.owner),
    [`${ATTR}type`]: String(brush.type),
    [`${ATTR}transform`]: formatNumbers(brush.transform),
    Vertices: { Vertex: brush.vertices.map((v) => ({ [`${ATTR}pos`]: formatPoint(v) })) },
    Face: brush.faces.map(faceNode),
  };
}

function entityNode(entity: CsxEntity): Record<string, unknown> {
  const properties: Record<string, string> = {};
  for (const [key, value] of entity.properties) {
    properties[ATTR + key] = value;
  }
  return {
    [`${ATTR}id`]: String(entity.id),
    [`${ATTR}classname`]: entity.classname,
    [`${ATTR}gametype`]: entity.gametype,
    ...(entity.origin ? { [`${ATTR}origin`]: formatPoint(entity.origin) } : {}),
    Properties: properties,
  };
}

function interiorMapNode(map: CsxInteriorMap): Record<string, unknown> {
  return {
    [`${ATTR}brushScale`]: String(map.brushScale),
    [`${ATTR}lightScale`]: String(map.lightScale),
    [`${ATTR}ambientColor`]: formatPoint(map.ambientColor),
    [`${ATTR}ambientColorEmerg`]: formatPoint(map.ambientColorEmerg),
    Entities: { Entity: map.entities.map(entityNode) },
    Brushes: { Brush: map.brushes.map(brushNode) },
  };
}

export function serializeCsx(scene: CsxScene): string {
  return builder.build({
    ConstructorScene: {
      [`${ATTR}version`]: String(scene.version),
      [`${ATTR}creator`]: scene.creator,
      DetailLevels: {
        DetailLevel: scene.detailLevels.map((map) => ({ InteriorMap: interiorMapNode(map) })),
      },
    },
  });
}
