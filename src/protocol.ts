// src/protocol.ts

import { parseNumericFlag, parseOnOff, protocolToDb } from "./converters";
import { ProtocolError } from "./errors";
import type {
	ClassifiedMessage,
	StateUpdate,
	StateUpdateKind,
	TrimChannel,
	Zone,
} from "./types";

// Line terminators and markers used by the processors
export const COMMAND_EOL = "\r";
export const RESPONSE_EOL = "\r";
export const ECHO_MARKER = "#";
export const COMMAND_PREFIX = "!";

/**
 * Verbosity levels understood by `!VERB(n)`.
 */
export const VERBOSITY = {
	/** Replies only */
	QUIET: 0,
	/** Replies plus unsolicited status updates */
	STATUS_UPDATES: 1,
	/** Status updates plus command echo (`#` prefixed) */
	ECHO: 2,
} as const;

/**
 * Command names per zone. Zone 2 uses its own names for the same operations.
 */
export const ZONE_COMMANDS = {
	main: {
		POWER_ON: "POWERONMAIN",
		POWER_OFF: "POWEROFFMAIN",
		POWER: "POWER",
		VOLUME: "VOL",
		MUTE: "MUTE",
		SOURCE: "SRC",
	},
	zone2: {
		POWER_ON: "POWERONZONE2",
		POWER_OFF: "POWEROFFZONE2",
		POWER: "POWERZONE2",
		VOLUME: "ZVOL",
		MUTE: "ZMUTE",
		SOURCE: "ZSRC",
	},
} as const satisfies Record<Zone, Record<string, string>>;

export const COMMANDS = {
	ROOMPERFECT_POSITION: "RPFOC",
	ROOMPERFECT_VOICING: "RPVOI",
	AUDIO_MODE: "AUDMODE",
	LIPSYNC: "LIPSYNC",
	LIPSYNC_RANGE: "LIPSYNCRANGE",
	LOUDNESS: "LOUDNESS",
	DTS_DIALOG: "DTSDIALOG",
	DTS_DIALOG_UP: "DTSDIALOGUP",
	DTS_DIALOG_DOWN: "DTSDIALOGDN",
	DTS_DIALOG_AVAILABLE: "DTSDIALOGAVAILABLE",
	DEVICE: "DEVICE",
	PING: "PING",
	INTERFACE: "INTERFACE",
	VERBOSITY: "VERB",
	MAX_VOLUME: "MAXVOL",
	DEFAULT_VOLUME: "DEFVOL",
	SOURCE_OFFSET: "SRCOFF",
} as const;

/** Value of `!DEFVOL` meaning the last volume is kept at power on */
export const DEFAULT_VOLUME_OFF = "OFF";

/**
 * Trim commands and their limits in dB.
 */
export const TRIM_CHANNELS: Record<
	TrimChannel,
	{ command: string; minDb: number; maxDb: number }
> = {
	bass: { command: "TRIMBASS", minDb: -12, maxDb: 12 },
	treble: { command: "TRIMTREB", minDb: -12, maxDb: 12 },
	center: { command: "TRIMCENTER", minDb: -10, maxDb: 10 },
	lfe: { command: "TRIMLFE", minDb: -10, maxDb: 10 },
	surrounds: { command: "TRIMSURRS", minDb: -10, maxDb: 10 },
	height: { command: "TRIMHEIGHT", minDb: -10, maxDb: 10 },
};

/** Limit of the per-source volume offset, either way, in dB */
export const SOURCE_OFFSET_LIMIT_DB = 10;

/**
 * The wire forms a command can take.
 */
export type CommandForm =
	| "action"
	| "set"
	| "query"
	| "queryIndex"
	| "increment"
	| "decrement";

/**
 * Builds a command string without its terminator.
 *
 * - action: `!NAME`
 * - set: `!NAME(value)`
 * - query: `!NAME?`
 * - queryIndex: `!NAME(value)?`, one entry of an indexed list
 * - increment / decrement: `!NAME+` / `!NAME-`, or `!NAME+(value)` with an amount
 */
export function formatCommand(
	name: string,
	form: CommandForm,
	value?: string | number,
): string {
	const base = `${COMMAND_PREFIX}${name}`;
	switch (form) {
		case "action":
			return base;
		case "set":
			if (value === undefined) {
				throw new RangeError(`Command ${base} needs a value`);
			}
			return `${base}(${value})`;
		case "query":
			return `${base}?`;
		case "queryIndex":
			if (value === undefined) {
				throw new RangeError(`Command ${base} needs an index`);
			}
			return `${base}(${value})?`;
		case "increment":
			return value === undefined ? `${base}+` : `${base}+(${value})`;
		case "decrement":
			return value === undefined ? `${base}-` : `${base}-(${value})`;
	}
}

/**
 * One row of the classifier table.
 */
export interface StatePattern {
	kind: StateUpdateKind;
	pattern: RegExp;
	build: (groups: string[], line: string) => StateUpdate;
}

function flagPattern(
	kind: "power" | "power_zone2",
	pattern: RegExp,
): StatePattern {
	return {
		kind,
		pattern,
		build: (groups, line) => ({
			type: "stateUpdate",
			kind,
			fields: { on: parseNumericFlag(groups[0]) },
			groups,
			line,
		}),
	};
}

function levelPattern(
	kind: "volume" | "volume_zone2",
	pattern: RegExp,
): StatePattern {
	return {
		kind,
		pattern,
		build: (groups, line) => {
			const value = Number.parseInt(groups[0], 10);
			return {
				type: "stateUpdate",
				kind,
				fields: { value, db: protocolToDb(value) },
				groups,
				line,
			};
		},
	};
}

function mutePattern(kind: "mute" | "mute_zone2", pattern: RegExp): StatePattern {
	return {
		kind,
		pattern,
		build: (groups, line) => ({
			type: "stateUpdate",
			kind,
			fields: { muted: parseOnOff(groups[0]) },
			groups,
			line,
		}),
	};
}

function indexedPattern(
	kind:
		| "source"
		| "source_zone2"
		| "roomperfect_position"
		| "roomperfect_voicing"
		| "audio_mode",
	pattern: RegExp,
): StatePattern {
	return {
		kind,
		pattern,
		build: (groups, line) => ({
			type: "stateUpdate",
			kind,
			fields: { index: Number.parseInt(groups[0], 10), name: groups[1] },
			groups,
			line,
		}),
	};
}

/**
 * Patterns for unsolicited state updates, tested in this order.
 * Every pattern is anchored at the start of the line and zone 2 variants come
 * before their main zone counterpart, so a line matches at most one kind.
 */
export const STATE_UPDATE_PATTERNS: readonly StatePattern[] = [
	flagPattern("power_zone2", /^!POWERZONE2\((\d+)\)/),
	flagPattern("power", /^!POWER\((\d+)\)/),
	levelPattern("volume_zone2", /^!ZVOL\((-?\d+)\)/),
	levelPattern("volume", /^!VOL\((-?\d+)\)/),
	mutePattern("mute_zone2", /^!ZMUTE(ON|OFF)\b/),
	mutePattern("mute", /^!MUTE(ON|OFF)\b/),
	indexedPattern("source_zone2", /^!ZSRC\((\d+)\)"([^"]*)"/),
	indexedPattern("source", /^!SRC\((\d+)\)"([^"]*)"/),
	indexedPattern("roomperfect_position", /^!RPFOC\((\d+)\)"([^"]*)"/),
	indexedPattern("roomperfect_voicing", /^!RPVOI\((\d+)\)"([^"]*)"/),
	indexedPattern("audio_mode", /^!AUDMODE\((\d+)\)"([^"]*)"/),
	{
		kind: "lipsync",
		pattern: /^!LIPSYNC\((\d+)\)/,
		build: (groups, line) => ({
			type: "stateUpdate",
			kind: "lipsync",
			fields: { ms: Number.parseInt(groups[0], 10) },
			groups,
			line,
		}),
	},
	{
		kind: "loudness",
		pattern: /^!LOUDNESS\((\d+)\)/,
		build: (groups, line) => ({
			type: "stateUpdate",
			kind: "loudness",
			fields: { enabled: parseNumericFlag(groups[0]) },
			groups,
			line,
		}),
	},
];

/**
 * Tries every state pattern in table order.
 * @returns The state update, or null if the line is not one
 */
export function parseStateUpdate(line: string): StateUpdate | null {
	for (const entry of STATE_UPDATE_PATTERNS) {
		const match = entry.pattern.exec(line);
		if (match) return entry.build(match.slice(1), line);
	}
	return null;
}

/**
 * Narrows a parsed update to the given kind(s).
 */
export function isStateUpdateOf<K extends StateUpdateKind>(
	update: StateUpdate | null,
	...kinds: K[]
): update is Extract<StateUpdate, { kind: K }> {
	if (update === null) return false;
	const actual: StateUpdateKind = update.kind;
	return kinds.some((kind) => kind === actual);
}

/**
 * Classifies one received line. Total for any line: echo lines, then known
 * state updates, and everything else as a plain reply.
 */
export function classifyLine(
	line: string,
	echoMarker: string = ECHO_MARKER,
): ClassifiedMessage {
	if (echoMarker.length > 0 && line.startsWith(echoMarker)) {
		return { type: "echo", line };
	}
	return parseStateUpdate(line) ?? { type: "reply", line };
}

/**
 * Checks that a received line is printable ASCII.
 * @returns null for a well-formed line, or the ProtocolError describing it
 */
export function validateLine(line: string): ProtocolError | null {
	for (let i = 0; i < line.length; i++) {
		const code = line.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) {
			return new ProtocolError(
				`Malformed line: non-printable byte 0x${code.toString(16).padStart(2, "0")} at offset ${i}`,
				line,
			);
		}
	}
	return null;
}

/**
 * Splits buffered text into complete lines.
 * @returns The complete non-empty lines and the unterminated remainder
 */
export function splitLines(
	buffer: string,
	eol: string,
): { lines: string[]; rest: string } {
	const parts = buffer.split(eol);
	const rest = parts.pop() ?? "";
	// Tolerate devices that send \r\n when \r is configured, and vice versa
	const lines = parts
		.map((part) => part.replace(/^[\r\n]+|[\r\n]+$/g, ""))
		.filter((part) => part.length > 0);
	return { lines, rest };
}
