/**
 * Settings store for editor preferences
 * Defaults can be overridden from FLAC_EDITOR_* environment variables
 */

import { createStore } from "zustand/vanilla";
import { ValidationError } from "@/lib/errors";

export interface AppSettings {
	// Save settings
	usePadding: boolean;
	paddingValue: string;
	verifyPaddingAfterSave: boolean;

	// Selection settings
	sortSelection: boolean;
	recurseDirectories: boolean;
}

export const defaultSettings: AppSettings = {
	// Save settings
	usePadding: false,
	paddingValue: "",
	verifyPaddingAfterSave: true,

	// Selection settings
	sortSelection: true,
	recurseDirectories: true,
};

// Map setting keys to environment variable names
const keyMap: Record<keyof AppSettings, string> = {
	usePadding: "FLAC_EDITOR_USE_PADDING",
	paddingValue: "FLAC_EDITOR_PADDING",
	verifyPaddingAfterSave: "FLAC_EDITOR_VERIFY_PADDING",
	sortSelection: "FLAC_EDITOR_SORT_SELECTION",
	recurseDirectories: "FLAC_EDITOR_RECURSE",
};

export type SettingsSource = Record<string, string | undefined>;

interface SettingsState {
	settings: AppSettings;
	initialized: boolean;

	// Actions
	initialize: (source?: SettingsSource) => void;
	updateSetting: <K extends keyof AppSettings>(
		key: K,
		value: AppSettings[K],
	) => void;
	updateSettings: (updates: Partial<AppSettings>) => void;
	resetSettings: () => void;
}

// Convert an environment string to the type of the matching default
function envToValue<K extends keyof AppSettings>(
	key: K,
	raw: string,
): AppSettings[K] {
	const defaultValue = defaultSettings[key];

	if (typeof defaultValue === "boolean") {
		const normalized = raw.trim().toLowerCase();
		if (["1", "true", "yes", "on"].includes(normalized)) {
			return true as AppSettings[K];
		}
		if (["0", "false", "no", "off"].includes(normalized)) {
			return false as AppSettings[K];
		}
		throw new ValidationError(`Invalid boolean for ${keyMap[key]}: ${raw}`, {
			key,
			raw,
		});
	}
	return raw as AppSettings[K];
}

export function readSettingsFrom(source: SettingsSource): Partial<AppSettings> {
	const loaded: Partial<AppSettings> = {};
	for (const key of Object.keys(keyMap) as (keyof AppSettings)[]) {
		const raw = source[keyMap[key]];
		if (raw === undefined || raw === "") continue;
		Object.assign(loaded, { [key]: envToValue(key, raw) });
	}
	return loaded;
}

/**
 * Resolve the padding size to request from the codec on save.
 * Returns undefined when padding should be left as it is.
 */
export function resolvePaddingOverride(
	settings: Pick<AppSettings, "usePadding" | "paddingValue">,
): number | undefined {
	if (!settings.usePadding) return undefined;

	const text = settings.paddingValue.trim();
	if (!/^\d+$/.test(text)) {
		throw new ValidationError(
			"Padding value must be a non-empty number when padding is enabled.",
			{ paddingValue: settings.paddingValue },
		);
	}
	const value = Number.parseInt(text, 10);
	// Block lengths are stored in 24 bits
	if (value > 0xffffff) {
		throw new ValidationError(`Padding value ${value} exceeds 16777215 bytes.`, {
			paddingValue: settings.paddingValue,
		});
	}
	return value;
}

export function createSettingsStore(initial: Partial<AppSettings> = {}) {
	return createStore<SettingsState>((set) => ({
		settings: { ...defaultSettings, ...initial },
		initialized: false,

		initialize: (source = process.env) => {
			const loaded = readSettingsFrom(source);
			set((state) => ({
				settings: { ...state.settings, ...loaded },
				initialized: true,
			}));
			console.log("[Settings] Loaded settings:", Object.keys(loaded));
		},

		updateSetting: (key, value) =>
			set((state) => ({ settings: { ...state.settings, [key]: value } })),

		updateSettings: (updates) =>
			set((state) => ({ settings: { ...state.settings, ...updates } })),

		resetSettings: () => set({ settings: { ...defaultSettings } }),
	}));
}

export type SettingsStore = ReturnType<typeof createSettingsStore>;
