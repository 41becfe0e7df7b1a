import { deepMerge, isPlainObject } from '../shared/deep-merge.js'
import { TabBarConfigError, formatIssues } from './errors.js'
import { defaultIcons } from './icons.js'
import {
  TabBarSettingsOverrideSchema,
  type TabBarSettingsOverride,
  type ZoomIndicatorType,
} from './settings-schema.js'

export type TabBarSettings = {
  tabs: {
    tabBarAtBottom: boolean
    hideTabBarIfOnlyOneTab: boolean
    tabMaxWidth: number
    unzoomOnSwitchPane: boolean
  }
  ui: {
    separators: {
      arrowSolidLeft: string
      arrowSolidRight: string
      arrowThinLeft: string
      arrowThinRight: string
    }
    icons: Record<string, string>
    tab: {
      zoomIndicator: {
        enabled: boolean
        type: ZoomIndicatorType
      }
    }
  }
}

export const defaultSettings: TabBarSettings = {
  tabs: {
    tabBarAtBottom: true,
    hideTabBarIfOnlyOneTab: false,
    tabMaxWidth: 32,
    unzoomOnSwitchPane: true,
  },
  ui: {
    separators: {
      arrowSolidLeft: '\u{e0b0}',
      arrowSolidRight: '\u{e0b2}',
      arrowThinLeft: '\u{e0b1}',
      arrowThinRight: '\u{e0b3}',
    },
    icons: defaultIcons,
    tab: {
      zoomIndicator: {
        enabled: false,
        type: 'icon',
      },
    },
  },
}

export function parseSettingsOverride(override: unknown): TabBarSettingsOverride {
  if (!isPlainObject(override)) {
    throw new TabBarConfigError('INVALID_OVERRIDE', 'Tab bar options must be an object')
  }
  const parsed = TabBarSettingsOverrideSchema.safeParse(override)
  if (!parsed.success) {
    throw new TabBarConfigError(
      'INVALID_OVERRIDE',
      `Invalid tab bar options: ${formatIssues(parsed.error.issues)}`,
      parsed.error.issues,
    )
  }
  return parsed.data
}

function lowercaseKeys(table: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(table).map(([name, icon]) => [name.toLowerCase(), icon]))
}

/**
 * Merges a validated override onto the defaults. Returns a fresh tree; the
 * defaults are never touched, so resolving the same override twice yields
 * equal settings.
 */
export function mergeSettings(base: TabBarSettings, override: TabBarSettingsOverride = {}): TabBarSettings {
  const merged = deepMerge(base, override)
  return {
    ...merged,
    ui: {
      ...merged.ui,
      icons: lowercaseKeys(merged.ui.icons),
    },
  }
}

export function resolveSettings(override?: unknown): TabBarSettings {
  if (override === undefined || override === null) return mergeSettings(defaultSettings)
  return mergeSettings(defaultSettings, parseSettingsOverride(override))
}
