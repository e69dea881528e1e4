import { create } from "zustand";
import { UI_SETTINGS_STORAGE_KEY } from "../lib/constants";

export type Language = "ko" | "en";

type UiSettingsState = {
  language: Language;
  setLanguage: (language: Language) => void;
};

export function loadLanguage(): Language {
  try {
    const raw = localStorage.getItem(UI_SETTINGS_STORAGE_KEY);
    if (!raw) return "en";
    const parsed = JSON.parse(raw) as { language?: Language };
    return parsed.language === "ko" ? "ko" : "en";
  } catch {
    return "en";
  }
}

function save(language: Language): void {
  try {
    localStorage.setItem(UI_SETTINGS_STORAGE_KEY, JSON.stringify({ language }));
  } catch (error) {
    console.warn("failed to persist ui settings", error);
  }
}

export const useUiSettingsStore = create<UiSettingsState>((set) => ({
  language: loadLanguage(),
  setLanguage: (language) => {
    set({ language });
    save(language);
  },
}));
