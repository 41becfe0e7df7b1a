import { isPlainObject } from '../shared/deep-merge.js'
import { TabBarConfigError } from './errors.js'
import { createTabTitleFormatter } from './format-tab-title.js'
import type { FormatTabTitleHandler, HostConfig, TerminalHost } from './host-types.js'
import { logger } from './logger.js'
import { resolveSettings, type TabBarSettings } from './settings.js'

export type TabBarPlugin = {
  settings: TabBarSettings
  formatTabTitle: FormatTabTitleHandler
}

function isHostConfig(value: unknown): value is HostConfig {
  return isPlainObject(value)
}

/**
 * Applies the tab bar settings to the host configuration and registers the
 * tab title formatter.
 *
 * @example
 * const tabBar = applyToConfig(host, config, {
 *   tabs: { tabMaxWidth: 40 },
 *   ui: { tab: { zoomIndicator: { enabled: true, type: 'number' } } },
 * })
 */
export function applyToConfig(host: TerminalHost, hostConfig: unknown, override?: unknown): TabBarPlugin {
  if (!isHostConfig(hostConfig)) {
    throw new TabBarConfigError('INVALID_HOST_CONFIG', 'Host configuration must be an object')
  }

  const settings = resolveSettings(override)

  hostConfig.useFancyTabBar = false
  hostConfig.tabBarAtBottom = settings.tabs.tabBarAtBottom
  hostConfig.hideTabBarIfOnlyOneTab = settings.tabs.hideTabBarIfOnlyOneTab
  hostConfig.tabMaxWidth = settings.tabs.tabMaxWidth
  hostConfig.unzoomOnSwitchPane = settings.tabs.unzoomOnSwitchPane

  const formatTabTitle = createTabTitleFormatter(settings, host.mux)
  host.on('format-tab-title', formatTabTitle)

  logger.info(
    {
      event: 'tab_bar_configured',
      tabs: settings.tabs,
      zoomIndicator: settings.ui.tab.zoomIndicator,
      iconCount: Object.keys(settings.ui.icons).length,
    },
    'Tab bar configured',
  )

  return { settings, formatTabTitle }
}

export { createTabTitleFormatter } from './format-tab-title.js'
export { TabBarConfigError, type TabBarErrorCode } from './errors.js'
export { defaultSettings, mergeSettings, resolveSettings, type TabBarSettings } from './settings.js'
export type { TabBarSettingsOverride, ZoomIndicatorType } from './settings-schema.js'
export type * from './host-types.js'
