import type { PackageRef } from "../../shared/types";

const VERSION_TRIPLET = /^(\d+)\.(\d+)\.(\d+)$/;

export function isVersionTriplet(value: string): boolean {
	return VERSION_TRIPLET.test(value);
}

/** Numeric comparison of two MAJOR.MINOR.PATCH strings. */
export function compareVersions(a: string, b: string): number {
	const left = parseTriplet(a);
	const right = parseTriplet(b);
	for (let i = 0; i < 3; i++) {
		const diff = (left[i] ?? 0) - (right[i] ?? 0);
		if (diff !== 0) return diff;
	}
	return 0;
}

function parseTriplet(value: string): number[] {
	const match = VERSION_TRIPLET.exec(value);
	if (!match) return [];
	return [Number(match[1]), Number(match[2]), Number(match[3])];
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Matches `@namespace/name:X.Y.Z` anywhere in a document and captures the
 * version. A new instance per call: the `g` flag makes the regex stateful.
 */
export function dependencyLinePattern(ref: PackageRef): RegExp {
	const prefix = escapeRegExp(`@${ref.namespace}/${ref.name}:`);
	return new RegExp(`${prefix}(\\d+\\.\\d+\\.\\d+)`, "g");
}

/** Versions currently pinned for `ref`, in document order. */
export function findDependencyVersions(text: string, ref: PackageRef): string[] {
	return Array.from(text.matchAll(dependencyLinePattern(ref)), (match) =>
		match[1] ?? "",
	);
}

export interface DependencyReplacement {
	text: string;
	replacements: number;
	previousVersions: string[];
}

export function replaceDependencyVersion(
	text: string,
	ref: PackageRef,
	version: string,
): DependencyReplacement {
	const previousVersions: string[] = [];
	const replaced = text.replace(
		dependencyLinePattern(ref),
		(_match, previous: string) => {
			previousVersions.push(previous);
			return `@${ref.namespace}/${ref.name}:${version}`;
		},
	);
	return {
		text: replaced,
		replacements: previousVersions.length,
		previousVersions,
	};
}
