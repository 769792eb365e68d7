import type { SensorEvent } from "@vertical-farm/common";

export type Random = () => number;

/** What a mock device puts on the wire. */
export type GeneratedEvent = SensorEvent & {
	/** Sensors currently driven out of bounds (flagged generator only). */
	flagged?: string[];
};

export interface EventGenerator {
	readonly deviceId: string;
	/** Produce the next sample, incrementing seq. */
	next(now?: Date): GeneratedEvent;
}

/**
 * GeneratorModule is the contract every mock data source follows.
 * - name: identifier used on the command line
 * - create: builds a generator for one device
 */
export interface GeneratorModule {
	readonly name: string;
	create(deviceId: string, random?: Random): EventGenerator;
}
