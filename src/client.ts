// src/client.ts

import { EventEmitter } from "node:events";
import {
	clamp,
	dbToProtocol,
	extractInteger,
	extractValue,
	parseIndexedReply,
	protocolToDb,
} from "./converters";
import { ProtocolEngine } from "./engine";
import { ProtocolError, UnsupportedFeatureError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { getModelConfig, type ModelConfig } from "./models";
import {
	COMMANDS,
	DEFAULT_VOLUME_OFF,
	formatCommand,
	SOURCE_OFFSET_LIMIT_DB,
	isStateUpdateOf,
	parseStateUpdate,
	TRIM_CHANNELS,
	VERBOSITY,
	ZONE_COMMANDS,
} from "./protocol";
import type {
	ConnectionState,
	Connectivity,
	DefaultVolume,
	IndexedValue,
	ProcessorClientEvents,
	ProcessorClientOptions,
	ProtocolEngineSettings,
	StateUpdate,
	StateUpdateHandler,
	StateUpdateKind,
	Subscription,
	TrimChannel,
	Zone,
} from "./types";

const DEFAULT_MODEL = "mp60";

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

function assertIndex(value: number, what: string): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new RangeError(
			`Invalid ${what}: ${value}. Must be a non-negative integer.`,
		);
	}
}

function assertDb(value: number, what: string): void {
	if (!Number.isFinite(value)) {
		throw new RangeError(`Invalid ${what}: ${value}. Must be a finite number.`);
	}
}

/**
 * Typed control of one processor. Every operation is a single command sent
 * through the ProtocolEngine; replies are parsed here and unsolicited status
 * lines are re-emitted as change events.
 */
export class ProcessorClient extends EventEmitter {
	private readonly engine: ProtocolEngine;
	private readonly model: ModelConfig;
	private readonly logger: Logger;
	private readonly verbosity: 0 | 1 | 2;

	constructor(
		options: ProcessorClientOptions,
		settings: ProtocolEngineSettings = {},
	) {
		super();

		this.model = getModelConfig(options.model ?? DEFAULT_MODEL);
		this.verbosity = options.verbosity ?? VERBOSITY.STATUS_UPDATES;
		this.logger =
			options.logger ??
			createLogger("ProcessorClient", options.debug ?? false);

		this.engine = new ProtocolEngine(
			{
				...options,
				serial: { ...this.model.serial, ...options.serial },
			},
			{
				minCommandIntervalMs: this.model.minCommandIntervalMs,
				commandTimeoutMs: this.model.commandTimeoutMs,
				...settings,
			},
		);

		this.engine.on("connect", () => this.emit("connect"));
		this.engine.on("disconnect", () => this.emit("disconnect"));
		this.engine.on("connectionStateChange", (state) =>
			this.emit("connectionStateChange", state),
		);
		this.engine.subscribe("any", (update) => this.handleStateUpdate(update));
	}

	// Safely override EventEmitter methods with strong types
	on<K extends keyof ProcessorClientEvents>(
		event: K,
		listener: ProcessorClientEvents[K],
	): this {
		return super.on(event, listener);
	}
	once<K extends keyof ProcessorClientEvents>(
		event: K,
		listener: ProcessorClientEvents[K],
	): this {
		return super.once(event, listener);
	}
	off<K extends keyof ProcessorClientEvents>(
		event: K,
		listener: ProcessorClientEvents[K],
	): this {
		return super.off(event, listener);
	}
	emit<K extends keyof ProcessorClientEvents>(
		event: K,
		...args: Parameters<ProcessorClientEvents[K]>
	): boolean {
		return super.emit(event, ...args);
	}

	private handleStateUpdate(update: StateUpdate): void {
		this.emit("stateUpdate", update);

		switch (update.kind) {
			case "power":
				this.emit("powerChange", "main", update.fields.on);
				break;
			case "power_zone2":
				this.emit("powerChange", "zone2", update.fields.on);
				break;
			case "volume":
				this.emit("volumeChange", "main", update.fields.db);
				break;
			case "volume_zone2":
				this.emit("volumeChange", "zone2", update.fields.db);
				break;
			case "mute":
				this.emit("muteChange", "main", update.fields.muted);
				break;
			case "mute_zone2":
				this.emit("muteChange", "zone2", update.fields.muted);
				break;
			case "source":
				this.emit("sourceChange", "main", update.fields);
				break;
			case "source_zone2":
				this.emit("sourceChange", "zone2", update.fields);
				break;
			case "roomperfect_position":
				this.emit("roomPerfectPositionChange", update.fields);
				break;
			case "roomperfect_voicing":
				this.emit("roomPerfectVoicingChange", update.fields);
				break;
			case "audio_mode":
				this.emit("audioModeChange", update.fields);
				break;
			case "lipsync":
				this.emit("lipsyncChange", update.fields.ms);
				break;
			case "loudness":
				this.emit("loudnessChange", update.fields.enabled);
				break;
		}
	}

	// --- CONNECTION ---

	/**
	 * Connects and enables status updates on the device.
	 * A device that rejects the verbosity command is still usable, so that
	 * failure is only logged.
	 */
	public async connect(): Promise<void> {
		await this.engine.connect();
		try {
			await this.setVerbosity(this.verbosity);
		} catch (err) {
			this.logger.warn(
				`Could not set verbosity ${this.verbosity}: ${errorMessage(err)}`,
			);
		}
		this.emit("ready");
	}

	public async disconnect(): Promise<void> {
		await this.engine.close();
	}

	public getConnectionState(): ConnectionState {
		return this.engine.getConnectionState();
	}

	public connectivityState(): Connectivity {
		return this.engine.connectivityState();
	}

	/**
	 * A copy of the model configuration in use.
	 */
	public getModel(): ModelConfig {
		return { ...this.model, serial: { ...this.model.serial } };
	}

	public updateSettings(settings: ProtocolEngineSettings): void {
		this.engine.updateSettings(settings);
	}

	/**
	 * Sends a raw command, e.g. `!VOL?`, for features without a typed method.
	 */
	public send(
		command: string,
		waitForReply = true,
		timeoutMs?: number,
	): Promise<string | undefined> {
		return this.engine.send(command, waitForReply, timeoutMs);
	}

	public subscribe(
		kind: StateUpdateKind | "any",
		handler: StateUpdateHandler,
	): Subscription {
		return this.engine.subscribe(kind, handler);
	}

	public unsubscribe(subscription: Subscription): boolean {
		return this.engine.unsubscribe(subscription);
	}

	// --- HELPERS ---

	private async command(command: string): Promise<void> {
		await this.engine.send(command);
	}

	private async request(command: string): Promise<string> {
		const reply = await this.engine.send(command);
		if (reply === undefined) {
			throw new ProtocolError(`No reply to ${command}`, "");
		}
		return reply;
	}

	private async queryValue(name: string): Promise<string | null> {
		return extractValue(await this.request(formatCommand(name, "query")), name);
	}

	private async queryInteger(name: string): Promise<number | null> {
		return extractInteger(
			await this.request(formatCommand(name, "query")),
			name,
		);
	}

	private async queryDb(name: string): Promise<number | null> {
		const value = await this.queryInteger(name);
		return value === null ? null : protocolToDb(value);
	}

	private async queryIndexed(name: string): Promise<IndexedValue | null> {
		return parseIndexedReply(
			await this.request(formatCommand(name, "query")),
			name,
		);
	}

	private stepCommand(
		name: string,
		form: "increment" | "decrement",
		amountDb?: number,
	): string {
		if (amountDb === undefined) {
			return formatCommand(name, form);
		}
		if (!Number.isFinite(amountDb) || amountDb <= 0) {
			throw new RangeError(
				`Invalid step: ${amountDb}. Must be a positive number of dB.`,
			);
		}
		return formatCommand(name, form, dbToProtocol(amountDb));
	}

	private assertDtsDialog(): void {
		if (!this.model.supportsDtsDialog) {
			throw new UnsupportedFeatureError("DTS dialog control", this.model.name);
		}
	}

	// --- POWER ---

	public async getPower(zone: Zone = "main"): Promise<boolean | null> {
		const value = await this.queryInteger(ZONE_COMMANDS[zone].POWER);
		return value === null ? null : value !== 0;
	}

	public async setPower(on: boolean, zone: Zone = "main"): Promise<void> {
		const names = ZONE_COMMANDS[zone];
		await this.command(
			formatCommand(on ? names.POWER_ON : names.POWER_OFF, "action"),
		);
	}

	// --- VOLUME ---

	/**
	 * @returns The volume in dB, or null for an unexpected reply
	 */
	public async getVolume(zone: Zone = "main"): Promise<number | null> {
		const value = await this.queryInteger(ZONE_COMMANDS[zone].VOLUME);
		return value === null ? null : protocolToDb(value);
	}

	/**
	 * Sets the volume in dB, clamped to the model's range.
	 */
	public async setVolume(db: number, zone: Zone = "main"): Promise<void> {
		assertDb(db, "volume");
		const value = clamp(
			dbToProtocol(db),
			this.model.minVolume,
			this.model.maxVolume,
		);
		await this.command(formatCommand(ZONE_COMMANDS[zone].VOLUME, "set", value));
	}

	/**
	 * Raises the volume by one device step, or by `amountDb`.
	 */
	public async volumeUp(amountDb?: number, zone: Zone = "main"): Promise<void> {
		await this.command(
			this.stepCommand(ZONE_COMMANDS[zone].VOLUME, "increment", amountDb),
		);
	}

	public async volumeDown(
		amountDb?: number,
		zone: Zone = "main",
	): Promise<void> {
		await this.command(
			this.stepCommand(ZONE_COMMANDS[zone].VOLUME, "decrement", amountDb),
		);
	}

	/**
	 * @returns The maximum volume setting in dB
	 */
	public async getMaxVolume(): Promise<number | null> {
		return this.queryDb(COMMANDS.MAX_VOLUME);
	}

	/**
	 * Sets the maximum volume in dB, clamped to -55 dB and the model's top.
	 */
	public async setMaxVolume(db: number): Promise<void> {
		assertDb(db, "maximum volume");
		const value = clamp(
			dbToProtocol(db),
			this.model.maxVolumeFloor,
			this.model.maxVolume,
		);
		await this.command(formatCommand(COMMANDS.MAX_VOLUME, "set", value));
	}

	/**
	 * @returns The power-on volume in dB, or "off" when the last volume is kept
	 */
	public async getDefaultVolume(): Promise<DefaultVolume | null> {
		const value = await this.queryValue(COMMANDS.DEFAULT_VOLUME);
		if (value === DEFAULT_VOLUME_OFF) return "off";
		if (value === null || !/^-?\d+$/.test(value)) return null;
		return protocolToDb(Number.parseInt(value, 10));
	}

	/**
	 * Sets the power-on volume in dB, clamped to the model's range.
	 * "off" keeps the last volume instead.
	 */
	public async setDefaultVolume(volume: DefaultVolume): Promise<void> {
		if (volume === "off") {
			await this.command(
				formatCommand(COMMANDS.DEFAULT_VOLUME, "set", DEFAULT_VOLUME_OFF),
			);
			return;
		}
		assertDb(volume, "default volume");
		const value = clamp(
			dbToProtocol(volume),
			this.model.minVolume,
			this.model.maxVolume,
		);
		await this.command(formatCommand(COMMANDS.DEFAULT_VOLUME, "set", value));
	}

	// --- MUTE ---

	public async getMute(zone: Zone = "main"): Promise<boolean | null> {
		const reply = await this.request(
			formatCommand(ZONE_COMMANDS[zone].MUTE, "query"),
		);
		const update = parseStateUpdate(reply);
		const kind = zone === "main" ? "mute" : "mute_zone2";
		return isStateUpdateOf(update, kind) ? update.fields.muted : null;
	}

	public async setMute(muted: boolean, zone: Zone = "main"): Promise<void> {
		const name = ZONE_COMMANDS[zone].MUTE;
		await this.command(formatCommand(muted ? `${name}ON` : `${name}OFF`, "action"));
	}

	public async toggleMute(zone: Zone = "main"): Promise<void> {
		await this.command(formatCommand(ZONE_COMMANDS[zone].MUTE, "action"));
	}

	// --- SOURCE ---

	public async getSource(zone: Zone = "main"): Promise<IndexedValue | null> {
		return this.queryIndexed(ZONE_COMMANDS[zone].SOURCE);
	}

	public async setSource(index: number, zone: Zone = "main"): Promise<void> {
		assertIndex(index, "source index");
		await this.command(formatCommand(ZONE_COMMANDS[zone].SOURCE, "set", index));
	}

	public async nextSource(zone: Zone = "main"): Promise<void> {
		await this.command(formatCommand(ZONE_COMMANDS[zone].SOURCE, "increment"));
	}

	public async previousSource(zone: Zone = "main"): Promise<void> {
		await this.command(formatCommand(ZONE_COMMANDS[zone].SOURCE, "decrement"));
	}

	/**
	 * Looks up one source by index without selecting it. The reply is also
	 * a source status line, so `sourceChange` fires for it.
	 */
	public async getSourceInfo(
		index: number,
		zone: Zone = "main",
	): Promise<IndexedValue | null> {
		assertIndex(index, "source index");
		const name = ZONE_COMMANDS[zone].SOURCE;
		const reply = await this.request(formatCommand(name, "queryIndex", index));
		return parseIndexedReply(reply, name);
	}

	/**
	 * @returns The volume offset of the current source in dB
	 */
	public async getSourceOffset(): Promise<number | null> {
		return this.queryDb(COMMANDS.SOURCE_OFFSET);
	}

	/**
	 * Sets the volume offset of the current source, clamped to ±10 dB.
	 */
	public async setSourceOffset(db: number): Promise<void> {
		assertDb(db, "source offset");
		const limit = dbToProtocol(SOURCE_OFFSET_LIMIT_DB);
		const value = clamp(dbToProtocol(db), -limit, limit);
		await this.command(formatCommand(COMMANDS.SOURCE_OFFSET, "set", value));
	}

	// --- ROOMPERFECT & AUDIO MODE ---

	public async getRoomPerfectPosition(): Promise<IndexedValue | null> {
		return this.queryIndexed(COMMANDS.ROOMPERFECT_POSITION);
	}

	public async setRoomPerfectPosition(index: number): Promise<void> {
		assertIndex(index, "RoomPerfect position");
		await this.command(
			formatCommand(COMMANDS.ROOMPERFECT_POSITION, "set", index),
		);
	}

	public async nextRoomPerfectPosition(): Promise<void> {
		await this.command(
			formatCommand(COMMANDS.ROOMPERFECT_POSITION, "increment"),
		);
	}

	public async previousRoomPerfectPosition(): Promise<void> {
		await this.command(
			formatCommand(COMMANDS.ROOMPERFECT_POSITION, "decrement"),
		);
	}

	public async getRoomPerfectVoicing(): Promise<IndexedValue | null> {
		return this.queryIndexed(COMMANDS.ROOMPERFECT_VOICING);
	}

	public async setRoomPerfectVoicing(index: number): Promise<void> {
		assertIndex(index, "RoomPerfect voicing");
		await this.command(
			formatCommand(COMMANDS.ROOMPERFECT_VOICING, "set", index),
		);
	}

	public async nextRoomPerfectVoicing(): Promise<void> {
		await this.command(
			formatCommand(COMMANDS.ROOMPERFECT_VOICING, "increment"),
		);
	}

	public async previousRoomPerfectVoicing(): Promise<void> {
		await this.command(
			formatCommand(COMMANDS.ROOMPERFECT_VOICING, "decrement"),
		);
	}

	public async getAudioMode(): Promise<IndexedValue | null> {
		return this.queryIndexed(COMMANDS.AUDIO_MODE);
	}

	public async setAudioMode(index: number): Promise<void> {
		assertIndex(index, "audio mode");
		await this.command(formatCommand(COMMANDS.AUDIO_MODE, "set", index));
	}

	public async nextAudioMode(): Promise<void> {
		await this.command(formatCommand(COMMANDS.AUDIO_MODE, "increment"));
	}

	public async previousAudioMode(): Promise<void> {
		await this.command(formatCommand(COMMANDS.AUDIO_MODE, "decrement"));
	}

	// --- LIPSYNC & LOUDNESS ---

	/**
	 * @returns The lipsync delay in ms
	 */
	public async getLipsync(): Promise<number | null> {
		return this.queryInteger(COMMANDS.LIPSYNC);
	}

	public async setLipsync(ms: number): Promise<void> {
		assertIndex(ms, "lipsync delay");
		await this.command(formatCommand(COMMANDS.LIPSYNC, "set", ms));
	}

	public async lipsyncUp(): Promise<void> {
		await this.command(formatCommand(COMMANDS.LIPSYNC, "increment"));
	}

	public async lipsyncDown(): Promise<void> {
		await this.command(formatCommand(COMMANDS.LIPSYNC, "decrement"));
	}

	/**
	 * The lipsync range the device accepts for the current source, in ms.
	 */
	public async getLipsyncRange(): Promise<{ min: number; max: number } | null> {
		const value = await this.queryValue(COMMANDS.LIPSYNC_RANGE);
		const match = value === null ? null : /^(-?\d+),(-?\d+)$/.exec(value);
		if (!match) return null;
		return {
			min: Number.parseInt(match[1], 10),
			max: Number.parseInt(match[2], 10),
		};
	}

	public async getLoudness(): Promise<boolean | null> {
		const value = await this.queryInteger(COMMANDS.LOUDNESS);
		return value === null ? null : value !== 0;
	}

	public async setLoudness(enabled: boolean): Promise<void> {
		await this.command(formatCommand(COMMANDS.LOUDNESS, "set", enabled ? 1 : 0));
	}

	// --- TRIMS ---

	/**
	 * @returns The trim in dB
	 */
	public async getTrim(channel: TrimChannel): Promise<number | null> {
		return this.queryDb(TRIM_CHANNELS[channel].command);
	}

	/**
	 * Sets a trim in dB, clamped to the channel's limits.
	 */
	public async setTrim(channel: TrimChannel, db: number): Promise<void> {
		assertDb(db, `${channel} trim`);
		const { command, minDb, maxDb } = TRIM_CHANNELS[channel];
		const value = clamp(
			dbToProtocol(db),
			dbToProtocol(minDb),
			dbToProtocol(maxDb),
		);
		await this.command(formatCommand(command, "set", value));
	}

	// --- DTS DIALOG ---

	/**
	 * Whether the current stream allows dialog control. Always false on
	 * models without the feature; the device is not asked.
	 */
	public async isDtsDialogAvailable(): Promise<boolean> {
		if (!this.model.supportsDtsDialog) return false;
		const value = await this.queryInteger(COMMANDS.DTS_DIALOG_AVAILABLE);
		return value !== null && value !== 0;
	}

	public async getDtsDialog(): Promise<number | null> {
		this.assertDtsDialog();
		return this.queryDb(COMMANDS.DTS_DIALOG);
	}

	public async dtsDialogUp(): Promise<void> {
		this.assertDtsDialog();
		await this.command(formatCommand(COMMANDS.DTS_DIALOG_UP, "action"));
	}

	public async dtsDialogDown(): Promise<void> {
		this.assertDtsDialog();
		await this.command(formatCommand(COMMANDS.DTS_DIALOG_DOWN, "action"));
	}

	// --- DEVICE ---

	public async getDeviceName(): Promise<string | null> {
		return this.queryValue(COMMANDS.DEVICE);
	}

	public async getInterface(): Promise<string | null> {
		return this.queryValue(COMMANDS.INTERFACE);
	}

	/**
	 * @returns true if the device answered `!PONG`
	 */
	public async ping(): Promise<boolean> {
		const reply = await this.request(formatCommand(COMMANDS.PING, "query"));
		return reply === "!PONG";
	}

	public async getVerbosity(): Promise<number | null> {
		return this.queryInteger(COMMANDS.VERBOSITY);
	}

	/**
	 * Sets how much the device reports unprompted, clamped to 0-2.
	 * Level 1 is needed for change events.
	 */
	public async setVerbosity(level: number): Promise<void> {
		if (!Number.isInteger(level)) {
			throw new RangeError(`Invalid verbosity: ${level}. Must be an integer.`);
		}
		const value = clamp(level, VERBOSITY.QUIET, VERBOSITY.ECHO);
		await this.command(formatCommand(COMMANDS.VERBOSITY, "set", value));
	}
}
