// src/converters.ts

import type { IndexedValue } from "./types";

/**
 * Converts decibels to the protocol's integer representation (0.1 dB steps).
 *
 * @param db - The dB value, e.g. -45.5
 * @returns The protocol value, e.g. -455
 */
export function dbToProtocol(db: number): number {
	// Math.round(-0) is -0, which would print as "0" anyway but compares oddly
	return Math.round(db * 10) || 0;
}

/**
 * Converts a protocol integer (0.1 dB steps) to decibels.
 *
 * @param value - The protocol value, e.g. -455
 * @returns The dB value, e.g. -45.5
 */
export function protocolToDb(value: number): number {
	return value / 10;
}

/**
 * Clamps a value into the inclusive range [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, value));
}

/**
 * Parses a `0`/`1` flag as used inside parentheses (`!POWER(1)`).
 */
export function parseNumericFlag(token: string): boolean {
	return token.trim() !== "0";
}

/**
 * Parses an `ON`/`OFF` suffix token (`!MUTEON`).
 */
export function parseOnOff(token: string): boolean {
	return token.trim().toUpperCase() === "ON";
}

/**
 * Extracts the value between the first pair of parentheses of a reply for
 * the given command name, e.g. `("!VOL(-350)", "VOL")` → `"-350"`.
 *
 * @returns The value, or null if the reply has another shape
 */
export function extractValue(reply: string, name: string): string | null {
	const prefix = `!${name}(`;
	if (!reply.startsWith(prefix)) return null;
	const end = reply.indexOf(")", prefix.length);
	if (end === -1) return null;
	return reply.slice(prefix.length, end);
}

/**
 * Extracts an integer value, e.g. `("!LIPSYNC(40)", "LIPSYNC")` → `40`.
 */
export function extractInteger(reply: string, name: string): number | null {
	const value = extractValue(reply, name);
	if (value === null || !/^-?\d+$/.test(value)) return null;
	return Number.parseInt(value, 10);
}

/**
 * Parses an indexed reply with a quoted label,
 * e.g. `('!SRC(3)"HDMI"', "SRC")` → `{ index: 3, name: "HDMI" }`.
 * A missing label yields an empty name.
 */
export function parseIndexedReply(
	reply: string,
	name: string,
): IndexedValue | null {
	const index = extractInteger(reply, name);
	if (index === null) return null;
	const label = /"([^"]*)"/.exec(reply);
	return { index, name: label ? label[1] : "" };
}
