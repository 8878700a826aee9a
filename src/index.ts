// src/index.ts

export { ProcessorClient } from "./client";
export { ProtocolEngine } from "./engine";
export { CallbackDispatcher } from "./dispatcher";
export { Throttle } from "./throttle";

// Wire format, classification and conversion
export * from "./protocol";
export * from "./converters";

// Transports
export {
	BaseTransport,
	createTransport,
	DEFAULT_BAUD_RATE,
	DEFAULT_IP_PORT,
	type Endpoint,
	parseEndpoint,
	SerialTransport,
	TcpTransport,
	type Transport,
	type TransportEvents,
} from "./transport";

export * from "./errors";
export { ConsoleLogger, createLogger, type Logger } from "./logger";
export * from "./models";

// All types and interfaces
export * from "./types";
