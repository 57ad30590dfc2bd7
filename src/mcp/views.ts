/**
 * bpfledger — JSON views for MCP output
 *
 * Entities carry bigint ids and Buffers, which JSON.stringify cannot render
 * as-is. Ids become decimal strings; program bytes are reported by length.
 */

import type { BpfMap, Link, Program, ProgramLocation } from '../types/entities.js';

export interface ProgramView extends Omit<Program, 'id' | 'mapOwnerId' | 'programBytes' | 'location'> {
  id: string;
  mapOwnerId?: string;
  programBytesLength: number;
  location: ProgramLocation;
}

export interface LinkView extends Omit<Link, 'id' | 'programId'> {
  id: string;
  programId: string;
}

export interface MapView extends Omit<BpfMap, 'id'> {
  id: string;
}

const REDACTED = '********';

function redactLocation(location: ProgramLocation): ProgramLocation {
  if (location.type === 'image' && location.password !== undefined) {
    return { ...location, password: REDACTED };
  }
  return location;
}

export function programView(program: Program): ProgramView {
  const { id, mapOwnerId, programBytes, location, ...rest } = program;
  return {
    ...rest,
    id: id.toString(),
    mapOwnerId: mapOwnerId?.toString(),
    programBytesLength: programBytes.length,
    location: redactLocation(location),
  };
}

export function linkView(link: Link): LinkView {
  return { ...link, id: link.id.toString(), programId: link.programId.toString() };
}

export function mapView(map: BpfMap): MapView {
  return { ...map, id: map.id.toString() };
}

export function jsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
