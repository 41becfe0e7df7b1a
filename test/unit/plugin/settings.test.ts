import { describe, it, expect } from 'vitest'
import { TabBarConfigError } from '../../../plugin/errors.js'
import {
  defaultSettings,
  mergeSettings,
  parseSettingsOverride,
  resolveSettings,
} from '../../../plugin/settings.js'

describe('defaultSettings', () => {
  it('documents the tab bar defaults', () => {
    expect(defaultSettings.tabs).toEqual({
      tabBarAtBottom: true,
      hideTabBarIfOnlyOneTab: false,
      tabMaxWidth: 32,
      unzoomOnSwitchPane: true,
    })
    expect(defaultSettings.ui.tab.zoomIndicator).toEqual({ enabled: false, type: 'icon' })
    expect(defaultSettings.ui.separators.arrowSolidLeft).toBe('\u{e0b0}')
    expect(defaultSettings.ui.separators.arrowThinLeft).toBe('\u{e0b1}')
  })
})

describe('resolveSettings', () => {
  it('returns the defaults when no override is given', () => {
    expect(resolveSettings()).toEqual(defaultSettings)
    expect(resolveSettings(null)).toEqual(defaultSettings)
  })

  it('returns a copy, never the defaults object itself', () => {
    const settings = resolveSettings()
    expect(settings).not.toBe(defaultSettings)
    expect(settings.ui).not.toBe(defaultSettings.ui)
  })

  it('shares no nested objects with the defaults', () => {
    const settings = resolveSettings()
    expect(settings.tabs).not.toBe(defaultSettings.tabs)
    expect(settings.ui.separators).not.toBe(defaultSettings.ui.separators)
    expect(settings.ui.icons).not.toBe(defaultSettings.ui.icons)
    expect(settings.ui.tab).not.toBe(defaultSettings.ui.tab)
    expect(settings.ui.tab.zoomIndicator).not.toBe(defaultSettings.ui.tab.zoomIndicator)
  })

  it('keeps the defaults intact when resolved settings are edited', () => {
    const first = resolveSettings()
    first.tabs.tabMaxWidth = 5
    first.ui.separators.arrowSolidLeft = '>'
    first.ui.tab.zoomIndicator.enabled = true

    const second = resolveSettings()
    expect(defaultSettings.tabs.tabMaxWidth).toBe(32)
    expect(second.tabs.tabMaxWidth).toBe(32)
    expect(second.ui.separators.arrowSolidLeft).toBe('\u{e0b0}')
    expect(second.ui.tab.zoomIndicator.enabled).toBe(false)
  })

  it('overrides only the leaves that are given', () => {
    const settings = resolveSettings({
      tabs: { tabMaxWidth: 40 },
      ui: { tab: { zoomIndicator: { enabled: true } } },
    })
    expect(settings.tabs.tabMaxWidth).toBe(40)
    expect(settings.tabs.tabBarAtBottom).toBe(true)
    expect(settings.ui.tab.zoomIndicator).toEqual({ enabled: true, type: 'icon' })
  })

  it('extends the icon table instead of replacing it', () => {
    const settings = resolveSettings({ ui: { icons: { htop: 'H' } } })
    expect(settings.ui.icons.htop).toBe('H')
    expect(settings.ui.icons.git).toBe('\u{e702}')
  })

  it('stores caller icon names in lowercase', () => {
    const settings = resolveSettings({ ui: { icons: { LazyDocker: 'L' } } })
    expect(settings.ui.icons.lazydocker).toBe('L')
    expect(settings.ui.icons.LazyDocker).toBeUndefined()
  })

  it('keeps unknown keys verbatim', () => {
    const settings = resolveSettings({ tabs: { experimental: 'yes' }, theme: { accent: '#ff0000' } })
    expect(settings).toMatchObject({ tabs: { experimental: 'yes' }, theme: { accent: '#ff0000' } })
  })

  it('leaves the defaults untouched after merging', () => {
    resolveSettings({ tabs: { tabMaxWidth: 12 }, ui: { icons: { htop: 'H' } } })
    expect(defaultSettings.tabs.tabMaxWidth).toBe(32)
    expect(defaultSettings.ui.icons.htop).toBeUndefined()
  })

  it('rejects a non-object override', () => {
    expect(() => resolveSettings('bottom')).toThrow(TabBarConfigError)
    expect(() => resolveSettings([1, 2])).toThrow('Tab bar options must be an object')
  })

  it('rejects known keys with the wrong shape', () => {
    let caught: unknown
    try {
      resolveSettings({ tabs: { tabMaxWidth: 'wide' } })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(TabBarConfigError)
    const error = caught as TabBarConfigError
    expect(error.code).toBe('INVALID_OVERRIDE')
    expect(error.issues[0].path).toEqual(['tabs', 'tabMaxWidth'])
    expect(error.message).toMatch(/^Invalid tab bar options: tabs\.tabMaxWidth: /)
  })

  it('rejects an unknown zoom indicator type', () => {
    expect(() => resolveSettings({ ui: { tab: { zoomIndicator: { type: 'badge' } } } })).toThrow(
      TabBarConfigError,
    )
  })
})

describe('mergeSettings', () => {
  it('is idempotent for the same override', () => {
    const override = parseSettingsOverride({
      tabs: { hideTabBarIfOnlyOneTab: true },
      ui: { icons: { htop: 'H' }, tab: { zoomIndicator: { enabled: true, type: 'number' } } },
    })
    const once = mergeSettings(defaultSettings, override)
    expect(mergeSettings(once, override)).toEqual(once)
  })
})
