// src/models.ts

import { DEFAULT_BAUD_RATE } from "./transport";
import type { SerialOptions } from "./types";

/**
 * Capabilities and timing of one processor model.
 */
export interface ModelConfig {
	name: string;
	description: string;
	/** Lowest volume, in protocol units (0.1 dB) */
	minVolume: number;
	/** Highest volume, in protocol units (0.1 dB) */
	maxVolume: number;
	/** Lowest value the maximum volume setting accepts, in protocol units */
	maxVolumeFloor: number;
	supportsDtsDialog: boolean;
	/** Minimum time between two commands, in ms */
	minCommandIntervalMs: number;
	/** Reply timeout, in ms */
	commandTimeoutMs: number;
	serial: Required<SerialOptions>;
}

const RS232_DEFAULTS: Required<SerialOptions> = {
	baudRate: DEFAULT_BAUD_RATE,
	dataBits: 8,
	parity: "none",
	stopBits: 1,
};

export const MODEL_CONFIGS = {
	mp50: {
		name: "MP-50",
		description: "MP-50 Surround Sound Processor",
		minVolume: -999, // -99.9dB
		maxVolume: 200, // +20.0dB
		maxVolumeFloor: -550, // -55.0dB
		supportsDtsDialog: false,
		minCommandIntervalMs: 50,
		commandTimeoutMs: 2000,
		serial: RS232_DEFAULTS,
	},
	mp60: {
		name: "MP-60",
		description: "MP-60 Surround Sound Processor",
		minVolume: -999, // -99.9dB
		maxVolume: 240, // +24.0dB
		maxVolumeFloor: -550, // -55.0dB
		supportsDtsDialog: true,
		minCommandIntervalMs: 50,
		commandTimeoutMs: 2000,
		serial: RS232_DEFAULTS,
	},
} satisfies Record<string, ModelConfig>;

export type ModelId = keyof typeof MODEL_CONFIGS;

export const SUPPORTED_MODELS = Object.keys(MODEL_CONFIGS);

export function isModelId(id: string): id is ModelId {
	return Object.prototype.hasOwnProperty.call(MODEL_CONFIGS, id);
}

/**
 * Looks up a model's configuration. The result is a copy; changing it does
 * not affect other lookups.
 * @throws RangeError for an unknown model
 */
export function getModelConfig(id: string): ModelConfig {
	if (!isModelId(id)) {
		throw new RangeError(
			`Unsupported model '${id}'. Supported: ${SUPPORTED_MODELS.join(", ")}`,
		);
	}
	const config: ModelConfig = MODEL_CONFIGS[id];
	return { ...config, serial: { ...config.serial } };
}
