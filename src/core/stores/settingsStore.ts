import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { createStore } from 'zustand/vanilla'
import { persist, type PersistStorage } from 'zustand/middleware'
import { isRecord } from '@/core/lib/guards'
import { makeLogger } from '@/core/lib/logger'

const log = makeLogger('settings')

/**
 * Editor preferences, persisted as a flat JSON file with snake_case keys.
 */
export interface EditorSettings {
  theme: string
  fontFamily: string
  fontSize: number
  tabWidth: number
  /** Seconds between auto-saves; 0 disables auto-save */
  autoSaveInterval: number
  aiEnabled: boolean
  aiAutoSuggest: boolean
  /** Pause (ms) after the last keystroke before a suggestion is requested */
  aiSuggestionDelay: number
}

export const DEFAULT_SETTINGS: EditorSettings = {
  theme: 'dark',
  fontFamily: 'Consolas',
  fontSize: 12,
  tabWidth: 4,
  autoSaveInterval: 30,
  aiEnabled: true,
  aiAutoSuggest: true,
  aiSuggestionDelay: 1500,
}

// ============================================================================
// FILE FORMAT
// ============================================================================

const FILE_KEYS: { [K in keyof EditorSettings]: string } = {
  theme: 'theme',
  fontFamily: 'font_family',
  fontSize: 'font_size',
  tabWidth: 'tab_width',
  autoSaveInterval: 'auto_save_interval',
  aiEnabled: 'ai_enabled',
  aiAutoSuggest: 'ai_auto_suggest',
  aiSuggestionDelay: 'ai_suggestion_delay',
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key]
  return typeof value === 'string' && value.trim() !== '' ? value : fallback
}

function readNumber(source: Record<string, unknown>, key: string, fallback: number, min: number): number {
  const value = source[key]
  return typeof value === 'number' && Number.isFinite(value) && value >= min ? value : fallback
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key]
  return typeof value === 'boolean' ? value : fallback
}

/**
 * Parse the file representation. Missing or invalid keys take the value from
 * `fallback`; anything that is not an object yields `fallback` entirely.
 */
export function normalizeSettings(raw: unknown, fallback: EditorSettings = DEFAULT_SETTINGS): EditorSettings {
  if (!isRecord(raw)) return { ...fallback }

  return {
    theme: readString(raw, FILE_KEYS.theme, fallback.theme),
    fontFamily: readString(raw, FILE_KEYS.fontFamily, fallback.fontFamily),
    fontSize: readNumber(raw, FILE_KEYS.fontSize, fallback.fontSize, 1),
    tabWidth: readNumber(raw, FILE_KEYS.tabWidth, fallback.tabWidth, 1),
    autoSaveInterval: readNumber(raw, FILE_KEYS.autoSaveInterval, fallback.autoSaveInterval, 0),
    aiEnabled: readBoolean(raw, FILE_KEYS.aiEnabled, fallback.aiEnabled),
    aiAutoSuggest: readBoolean(raw, FILE_KEYS.aiAutoSuggest, fallback.aiAutoSuggest),
    aiSuggestionDelay: readNumber(raw, FILE_KEYS.aiSuggestionDelay, fallback.aiSuggestionDelay, 0),
  }
}

export function toFileFormat(settings: EditorSettings): Record<string, string | number | boolean> {
  return {
    [FILE_KEYS.theme]: settings.theme,
    [FILE_KEYS.fontFamily]: settings.fontFamily,
    [FILE_KEYS.fontSize]: settings.fontSize,
    [FILE_KEYS.tabWidth]: settings.tabWidth,
    [FILE_KEYS.autoSaveInterval]: settings.autoSaveInterval,
    [FILE_KEYS.aiEnabled]: settings.aiEnabled,
    [FILE_KEYS.aiAutoSuggest]: settings.aiAutoSuggest,
    [FILE_KEYS.aiSuggestionDelay]: settings.aiSuggestionDelay,
  }
}

function pickSettings(state: EditorSettings): EditorSettings {
  return {
    theme: state.theme,
    fontFamily: state.fontFamily,
    fontSize: state.fontSize,
    tabWidth: state.tabWidth,
    autoSaveInterval: state.autoSaveInterval,
    aiEnabled: state.aiEnabled,
    aiAutoSuggest: state.aiAutoSuggest,
    aiSuggestionDelay: state.aiSuggestionDelay,
  }
}

/**
 * Synchronous JSON-file storage for the persist middleware, so settings are
 * hydrated by the time the store is created. A missing or corrupt file reads
 * as "nothing stored" and the defaults stay in place.
 */
export function createSettingsFileStorage(filePath: string): PersistStorage<EditorSettings> {
  return {
    getItem: () => {
      let raw: string
      try {
        raw = readFileSync(filePath, 'utf8')
      } catch (error) {
        log.debug('No settings file, using defaults', filePath, error)
        return null
      }

      try {
        return { state: normalizeSettings(JSON.parse(raw)), version: 0 }
      } catch (error) {
        log.warn('Settings file is not valid JSON, using defaults', filePath, error)
        return null
      }
    },
    setItem: (_name, value) => {
      try {
        mkdirSync(path.dirname(filePath), { recursive: true })
        writeFileSync(filePath, `${JSON.stringify(toFileFormat(value.state), null, 2)}\n`, 'utf8')
      } catch (error) {
        log.warn('Failed to write settings', filePath, error)
      }
    },
    removeItem: () => {
      try {
        rmSync(filePath, { force: true })
      } catch (error) {
        log.warn('Failed to remove settings', filePath, error)
      }
    },
  }
}

export function defaultSettingsPath(): string {
  return path.join(os.homedir(), '.codepad', 'settings.json')
}

// ============================================================================
// STORE
// ============================================================================

export interface SettingsState extends EditorSettings {
  /** Apply a partial update; invalid values keep the current setting */
  update: (patch: Partial<EditorSettings>) => void
  reset: () => void
}

export function createSettingsStore(filePath: string = defaultSettingsPath()) {
  return createStore<SettingsState>()(
    persist(
      (set, get) => ({
        ...DEFAULT_SETTINGS,

        update: (patch) => {
          const current = pickSettings(get())
          set(normalizeSettings(toFileFormat({ ...current, ...patch }), current))
        },

        reset: () => set({ ...DEFAULT_SETTINGS }),
      }),
      {
        name: 'editor-settings',
        storage: createSettingsFileStorage(filePath),
        partialize: (state) => pickSettings(state),
      }
    )
  )
}

export type SettingsStore = ReturnType<typeof createSettingsStore>
