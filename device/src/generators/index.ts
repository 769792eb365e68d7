import type { GeneratorModule } from "./types";
import SteadyGenerator from "./steady";
import FlaggedGenerator from "./flagged";

const registry = new Map<string, GeneratorModule>([
	[SteadyGenerator.name, SteadyGenerator],
	[FlaggedGenerator.name, FlaggedGenerator]
]);

export function generatorNames(): string[] {
	return Array.from(registry.keys());
}

/**
 * Resolve a generator by name.
 * Throws if the name is unknown.
 */
export function getGenerator(name: string): GeneratorModule {
	const mod = registry.get(name);
	if (!mod) {
		throw new Error(`Unsupported generator '${name}' (available: ${generatorNames().join(", ")})`);
	}
	return mod;
}
