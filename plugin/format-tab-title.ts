import type { FormatTabTitleHandler, Mux } from './host-types.js'
import { logger, withLogContext } from './logger.js'
import type { TabBarSettings } from './settings.js'
import { buildTabSegments, resolveTabBarColors, resolveTabPosition } from './tab-segments.js'
import { formatTabTitle } from './tab-title.js'
import { findTabIndex, formatTabMeta, livePanes } from './zoom-indicator.js'

/**
 * Builds the host's "format-tab-title" callback around one resolved settings
 * tree. Pane state is read from the multiplexer on every call since it can
 * change between redraws.
 */
export function createTabTitleFormatter(settings: TabBarSettings, mux: Mux): FormatTabTitleHandler {
  return (tab, tabs, _panes, hostConfig, _hover, maxWidth) =>
    withLogContext({ tabId: tab.tabId, tabIndex: tab.tabIndex }, () => {
      const colors = resolveTabBarColors(hostConfig)
      const index = findTabIndex(tabs, tab)
      const title = formatTabTitle(tab, settings, maxWidth)
      const meta = formatTabMeta(index, livePanes(mux, tab.tabId), settings.ui.tab.zoomIndicator)
      const position = resolveTabPosition(index, tabs.length, tab.isActive)

      logger.trace({ event: 'tab_title_formatted', position, meta }, 'Formatted tab title')

      return buildTabSegments(position, {
        index,
        tabs,
        text: ` ${meta} ${settings.ui.separators.arrowThinLeft}${title}`,
        colors,
        separators: settings.ui.separators,
      })
    })
}
