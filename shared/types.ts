import type { NOTEBOOK_SECTIONS } from "./constants";

export type NotebookSection = (typeof NOTEBOOK_SECTIONS)[number];

/** A parsed `@namespace/name` package reference. */
export interface PackageRef {
	namespace: string;
	name: string;
}

/** Options passed to the template's `notebook.with(...)` transform. */
export interface NotebookOptions {
	teamName: string;
	season: string;
	/** Year range as printed on the cover, e.g. "2025-2026" */
	year: string;
	/** Theme name exported by the template package, e.g. "radial" */
	theme: string;
}

export interface EntryType {
	name: string;
	/** Lowercase "#rrggbb" */
	color: string;
	rgb: { r: number; g: number; b: number };
}

export interface CalendarDate {
	year: number;
	month: number;
	day: number;
}

/** Everything needed to write one notebook entry. */
export interface EntryDraft {
	section: NotebookSection;
	/** May contain "/" to nest the entry; the last segment is the displayed title */
	title: string;
	type: string;
	date: CalendarDate;
	author: string;
	witness: string;
}

export type VersionStrategy = "first" | "latest";
