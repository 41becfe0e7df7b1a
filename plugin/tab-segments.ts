import { isPlainObject } from '../shared/deep-merge.js'
import { TabBarConfigError } from './errors.js'
import type { FormatItem, HostConfig, TabBarColors, TabColors, TabInformation } from './host-types.js'
import type { TabBarSettings } from './settings.js'

export type TabPosition = 'active' | 'inactive-first' | 'inactive-middle' | 'inactive-last'

function isTabColors(value: unknown): value is TabColors {
  return (
    isPlainObject(value) &&
    typeof value.bgColor === 'string' &&
    typeof value.fgColor === 'string'
  )
}

export function isTabBarColors(value: unknown): value is TabBarColors {
  return (
    isPlainObject(value) &&
    typeof value.background === 'string' &&
    isTabColors(value.activeTab) &&
    isTabColors(value.inactiveTab)
  )
}

/**
 * Tab bar colors for the current host configuration. An explicit
 * `colors.tabBar` wins over the active color scheme's palette.
 */
export function resolveTabBarColors(hostConfig: HostConfig): TabBarColors {
  const explicit: unknown = hostConfig.colors?.tabBar
  if (explicit !== undefined) {
    if (!isTabBarColors(explicit)) {
      throw new TabBarConfigError('COLOR_SCHEME_MISSING', 'Incomplete tab bar colors in colors.tabBar')
    }
    return explicit
  }

  const schemeName = hostConfig.colorScheme
  const scheme = schemeName ? hostConfig.colorSchemes?.[schemeName] : undefined
  const tabBar: unknown = scheme?.tabBar
  if (tabBar === undefined) {
    throw new TabBarConfigError(
      'COLOR_SCHEME_MISSING',
      `No tab bar colors found for color scheme ${schemeName ? `"${schemeName}"` : '(none)'}`,
    )
  }
  if (!isTabBarColors(tabBar)) {
    throw new TabBarConfigError(
      'COLOR_SCHEME_MISSING',
      `Incomplete tab bar colors in color scheme "${schemeName}"`,
    )
  }
  return tabBar
}

export function resolveTabPosition(index: number, count: number, isActive: boolean): TabPosition {
  if (isActive) return 'active'
  if (index >= count) return 'inactive-last'
  if (index <= 1) return 'inactive-first'
  return 'inactive-middle'
}

export type TabSegmentsInput = {
  index: number
  tabs: TabInformation[]
  text: string
  colors: TabBarColors
  separators: TabBarSettings['ui']['separators']
}

/** Background the closing separator blends into: the next tab, or the bar itself. */
function trailingBackground(position: TabPosition, input: TabSegmentsInput): string {
  const { colors, index, tabs } = input
  const isLast = index >= tabs.length
  if (isLast) return colors.background
  if (position === 'active') return colors.inactiveTab.bgColor
  const next = tabs[index]
  return next?.isActive ? colors.activeTab.bgColor : colors.inactiveTab.bgColor
}

export function buildTabSegments(position: TabPosition, input: TabSegmentsInput): FormatItem[] {
  const { colors, separators, text } = input
  const own = position === 'active' ? colors.activeTab : colors.inactiveTab

  const items: FormatItem[] = [
    { type: 'background', color: own.bgColor },
    { type: 'foreground', color: own.fgColor },
  ]
  if (position === 'active') items.push({ type: 'attribute', intensity: 'Bold' })

  items.push(
    { type: 'text', text },
    { type: 'background', color: colors.background },
    { type: 'foreground', color: own.bgColor },
    { type: 'text', text: separators.arrowSolidLeft },
    { type: 'background', color: trailingBackground(position, input) },
    { type: 'foreground', color: colors.background },
    { type: 'text', text: separators.arrowSolidLeft },
  )
  return items
}
