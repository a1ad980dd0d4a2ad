/**
 * ZenseHome gateway protocol encoding/decoding
 * Frame format: >>[verb] [args...]<<
 */

import { ProtocolError } from './errors';

export const FRAME_START = '>>';
export const FRAME_END = '<<';
export const MAX_LEVEL = 100;

const DEVICE_ID = /^[A-Za-z0-9_-]+$/;

export function encodeFrame(command: string): string {
  return `${FRAME_START}${command}${FRAME_END}`;
}

export function clampLevel(level: number): number {
  return Math.max(0, Math.min(MAX_LEVEL, Math.round(level)));
}

export function isValidDeviceId(id: string): boolean {
  return DEVICE_ID.test(id);
}

export function loginCommand(code: string): string {
  return `Login ${code}`;
}

export function setCommand(id: string, level: number): string {
  return `Set ${id} ${clampLevel(level)}`;
}

export function fadeCommand(id: string, level: number): string {
  return `Fade ${id} ${clampLevel(level)}`;
}

export function getCommand(id: string): string {
  return `Get ${id}`;
}

export function getNameCommand(id: string): string {
  return `Get Name ${id}`;
}

export const GET_DEVICES_COMMAND = 'Get Devices';

/**
 * Cut the first complete frame out of a receive buffer.
 * Returns null while the terminator has not arrived yet.
 */
export function takeFrame(buffer: string): { frame: string; rest: string } | null {
  const end = buffer.indexOf(FRAME_END);
  if (end === -1) {
    return null;
  }
  return {
    frame: buffer.slice(0, end + FRAME_END.length),
    rest: buffer.slice(end + FRAME_END.length),
  };
}

/** Strip the >> << markers, rejecting anything that is not a frame */
export function unwrapFrame(frame: string): string {
  const trimmed = frame.trim();
  const start = trimmed.lastIndexOf(FRAME_START);
  if (start === -1 || !trimmed.endsWith(FRAME_END)) {
    throw new ProtocolError(`Unframed response: ${JSON.stringify(frame)}`);
  }
  return trimmed.slice(start + FRAME_START.length, trimmed.length - FRAME_END.length).trim();
}

export function isLoginOk(frame: string): boolean {
  return frame.includes(`${FRAME_START}Login Ok${FRAME_END}`);
}

/** Accepts any well-formed frame as the acknowledgement of Set/Fade */
export function parseAck(frame: string): string {
  return unwrapFrame(frame);
}

export function parseLevel(frame: string): number {
  const body = unwrapFrame(frame);
  const match = body.match(/^Get\s+(-?\d+)$/);
  if (!match) {
    throw new ProtocolError(`Unexpected Get response: ${JSON.stringify(body)}`);
  }
  return clampLevel(parseInt(match[1], 10));
}

export function parseDeviceList(frame: string): string[] {
  const body = unwrapFrame(frame);
  const prefix = `${GET_DEVICES_COMMAND} `;
  if (!body.startsWith(prefix)) {
    throw new ProtocolError(`Unexpected Get Devices response: ${JSON.stringify(body)}`);
  }
  return body
    .slice(prefix.length)
    .split(',')
    .map((id) => id.trim())
    .filter((id) => /^\d+$/.test(id));
}

/** Gateway answers 'Timeout' for ids it could not reach; callers fall back to a generated name */
export function parseName(frame: string): string | null {
  const body = unwrapFrame(frame);
  const prefix = 'Get Name ';
  if (!body.startsWith(prefix)) {
    throw new ProtocolError(`Unexpected Get Name response: ${JSON.stringify(body)}`);
  }
  const name = body.slice(prefix.length).trim().replace(/^'+|'+$/g, '');
  if (!name || name.toLowerCase() === 'timeout') {
    return null;
  }
  return name;
}
