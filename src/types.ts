// src/types.ts

import type { ProtocolError } from "./errors";
import type { Logger } from "./logger";
import type { Transport } from "./transport";

/**
 * Enum for the engine's connection state.
 */
export enum ConnectionState {
	/** No transport is open */
	DISCONNECTED = "disconnected",
	/** The transport is being opened */
	CONNECTING = "connecting",
	/** The transport is open and commands may be sent */
	CONNECTED = "connected",
	/** Waiting to re-open the transport after it was lost */
	RECONNECTING = "reconnecting",
}

/**
 * Coarse connectivity as seen by callers of the engine.
 */
export type Connectivity = "connected" | "disconnected";

/**
 * Independently controllable output path of the processor.
 */
export type Zone = "main" | "zone2";

/**
 * An indexed state with a display label, e.g. `!SRC(3)"HDMI"`.
 */
export interface IndexedValue {
	index: number;
	name: string;
}

/**
 * Typed fields carried by each kind of unsolicited state update.
 */
export interface StateUpdateFields {
	power: { on: boolean };
	power_zone2: { on: boolean };
	volume: { value: number; db: number };
	volume_zone2: { value: number; db: number };
	mute: { muted: boolean };
	mute_zone2: { muted: boolean };
	source: IndexedValue;
	source_zone2: IndexedValue;
	roomperfect_position: IndexedValue;
	roomperfect_voicing: IndexedValue;
	audio_mode: IndexedValue;
	lipsync: { ms: number };
	loudness: { enabled: boolean };
}

export type StateUpdateKind = keyof StateUpdateFields;

/**
 * A classified unsolicited status line. Discriminated on `kind`.
 */
export type StateUpdate = {
	[K in StateUpdateKind]: {
		type: "stateUpdate";
		kind: K;
		fields: StateUpdateFields[K];
		/** Raw regex groups, in pattern order */
		groups: string[];
		line: string;
	};
}[StateUpdateKind];

/**
 * The result of classifying one received line.
 */
export type ClassifiedMessage =
	| { type: "echo"; line: string }
	| { type: "reply"; line: string }
	| StateUpdate;

/**
 * Callback for state updates. May return a promise; rejections are logged.
 */
export type StateUpdateHandler = (update: StateUpdate) => void | Promise<void>;

/**
 * Handle returned by `subscribe`, used to unsubscribe.
 */
export interface Subscription {
	readonly id: number;
	readonly kind: StateUpdateKind | "any";
}

/**
 * Serial line parameters.
 */
export interface SerialOptions {
	/** @default 115200 */
	baudRate?: number;
	/** @default 8 */
	dataBits?: 5 | 6 | 7 | 8;
	/** @default "none" */
	parity?: "none" | "even" | "odd" | "mark" | "space";
	/** @default 1 */
	stopBits?: 1 | 1.5 | 2;
}

/**
 * Builds the transport for an endpoint. Replaced in tests.
 */
export type TransportFactory = (
	endpoint: string,
	serial: SerialOptions,
	connectTimeoutMs: number,
) => Transport;

/**
 * Configuration options for the ProtocolEngine.
 */
export interface ProtocolEngineOptions {
	/**
	 * Serial device path (`/dev/ttyUSB0`, `COM3`) or network endpoint
	 * (`socket://192.168.1.50:84`, `tcp://192.168.1.50`).
	 */
	endpoint: string;
	/** Serial line parameters, ignored for network endpoints */
	serial?: SerialOptions;
	/**
	 * Terminator appended to every command.
	 * @default "\r"
	 */
	commandEol?: string;
	/**
	 * Terminator that ends every received line.
	 * @default "\r"
	 */
	responseEol?: string;
	/**
	 * Prefix of command echo lines (verbosity level 2).
	 * @default "#"
	 */
	echoMarker?: string;
	/**
	 * Re-open the transport after it is lost.
	 * @default false
	 */
	autoReconnect?: boolean;
	/**
	 * Delay in milliseconds before re-opening the transport.
	 * @default 5000
	 */
	reconnectInterval?: number;
	/**
	 * Whether to enable debug logging.
	 * @default false
	 */
	debug?: boolean;
	/** Log sink; defaults to a timestamped console logger */
	logger?: Logger;
	/** Transport factory; defaults to TCP or serial based on the endpoint */
	createTransport?: TransportFactory;
}

/**
 * Protocol timing. All values are in milliseconds.
 */
export interface ProtocolEngineSettings {
	/** Minimum time between two writes (default: 50) */
	minCommandIntervalMs?: number;
	/** Default timeout for a reply (default: 2000) */
	commandTimeoutMs?: number;
	/** How long `send` and `connect` wait for the transport (default: 2000) */
	connectTimeoutMs?: number;
}

/**
 * Defines the event map for the ProtocolEngine's EventEmitter.
 */
export interface ProtocolEngineEvents {
	/** Emitted when the transport is open */
	connect: () => void;
	/** Emitted when the transport closes, for any reason */
	disconnect: () => void;
	/** Emitted when the connection state changes */
	connectionStateChange: (state: ConnectionState) => void;
	/** Emitted for every well-formed received line */
	line: (message: ClassifiedMessage) => void;
	/** Emitted for every classified state update */
	stateUpdate: (update: StateUpdate) => void;
	/** Emitted when a received line is dropped as malformed */
	protocolError: (error: ProtocolError) => void;
}

/**
 * Configuration options for the ProcessorClient.
 */
export interface ProcessorClientOptions extends ProtocolEngineOptions {
	/**
	 * Model identifier, selects volume range, timing and serial defaults.
	 * @default "mp60"
	 */
	model?: string;
	/**
	 * Verbosity level set on connect; 1 enables unsolicited status updates.
	 * @default 1
	 */
	verbosity?: 0 | 1 | 2;
}

/**
 * The volume applied at power on, or "off" to keep the last volume.
 */
export type DefaultVolume = number | "off";

/**
 * Tone and channel trims.
 */
export type TrimChannel =
	| "bass"
	| "treble"
	| "center"
	| "lfe"
	| "surrounds"
	| "height";

/**
 * Defines the event map for the ProcessorClient's EventEmitter.
 */
export interface ProcessorClientEvents {
	/** Emitted when the transport is open */
	connect: () => void;
	/** Emitted when the transport closes */
	disconnect: () => void;
	/** Emitted once the client has configured the device after connecting */
	ready: () => void;
	/** Emitted when the connection state changes */
	connectionStateChange: (state: ConnectionState) => void;
	/** Emitted for every classified state update */
	stateUpdate: (update: StateUpdate) => void;

	/** Emitted when a zone is powered on or off */
	powerChange: (zone: Zone, on: boolean) => void;
	/** Emitted when a zone's volume changes, in dB */
	volumeChange: (zone: Zone, db: number) => void;
	/** Emitted when a zone is muted or unmuted */
	muteChange: (zone: Zone, muted: boolean) => void;
	/** Emitted when a zone's source changes */
	sourceChange: (zone: Zone, source: IndexedValue) => void;
	/** Emitted when the RoomPerfect focus position changes */
	roomPerfectPositionChange: (position: IndexedValue) => void;
	/** Emitted when the RoomPerfect voicing changes */
	roomPerfectVoicingChange: (voicing: IndexedValue) => void;
	/** Emitted when the audio mode changes */
	audioModeChange: (mode: IndexedValue) => void;
	/** Emitted when the lipsync delay changes, in ms */
	lipsyncChange: (ms: number) => void;
	/** Emitted when loudness is switched on or off */
	loudnessChange: (enabled: boolean) => void;
}
