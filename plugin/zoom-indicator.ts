import type { Mux, PaneWithInfo, TabInformation } from './host-types.js'
import { logger } from './logger.js'
import type { TabBarSettings } from './settings.js'

export const ZOOM_ICON = '\u{f0c9}'

const SUBSCRIPT_DIGITS = ['₁', '₂', '₃', '₄', '₅', '₆', '₇', '₈', '₉']
const SUBSCRIPT_MANY = 'x'

export function subscriptCount(count: number): string {
  const digit = count > SUBSCRIPT_DIGITS.length ? SUBSCRIPT_MANY : SUBSCRIPT_DIGITS[count - 1]
  return `₍${digit}₎`
}

export function findTabIndex(tabs: TabInformation[], tab: TabInformation): number {
  return tabs.findIndex((candidate) => candidate.tabId === tab.tabId) + 1
}

export function livePanes(mux: Mux, tabId: number): PaneWithInfo[] {
  const muxTab = mux.getTab(tabId)
  if (!muxTab) {
    logger.debug({ event: 'mux_tab_missing', tabId }, 'Tab not found in multiplexer')
    return []
  }
  return muxTab.panesWithInfo()
}

/**
 * Text shown before the tab's thin separator: the 1-based index, optionally
 * decorated with the pane count or replaced by the zoom glyph.
 */
export function formatTabMeta(
  index: number,
  panes: PaneWithInfo[],
  zoomIndicator: TabBarSettings['ui']['tab']['zoomIndicator'],
): string {
  if (!zoomIndicator.enabled) return String(index)

  const count = panes.length
  if (count <= 1) return String(index)

  if (panes.some((pane) => pane.isZoomed)) {
    // Icon style shows the glyph without the index.
    if (zoomIndicator.type === 'icon') return ZOOM_ICON
    if (zoomIndicator.type === 'number') return ZOOM_ICON + subscriptCount(count)
  }

  return `${index}${subscriptCount(count)}`
}
