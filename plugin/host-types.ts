/**
 * Shapes the terminal host hands to the plugin. The host owns all of these;
 * the plugin reads them and never mutates anything except the tab-bar fields
 * of HostConfig during setup.
 */

export type PaneInformation = {
  paneId: number
  title: string
  isActive?: boolean
  isZoomed?: boolean
  foregroundProcessName?: string
}

export type TabInformation = {
  tabId: number
  tabIndex: number
  isActive: boolean
  tabTitle: string
  activePane: PaneInformation
}

// One entry of the multiplexer's live pane listing for a tab.
export type PaneWithInfo = {
  index: number
  isActive: boolean
  isZoomed: boolean
  left?: number
  top?: number
  width?: number
  height?: number
}

export interface MuxTab {
  panesWithInfo(): PaneWithInfo[]
}

export interface Mux {
  getTab(tabId: number): MuxTab | undefined
}

export type TabColors = {
  bgColor: string
  fgColor: string
}

export type TabBarColors = {
  background: string
  activeTab: TabColors
  inactiveTab: TabColors
}

// As written in the user's configuration; any field may be missing.
export type TabBarColorsConfig = {
  background?: string
  activeTab?: Partial<TabColors>
  inactiveTab?: Partial<TabColors>
}

export type ColorScheme = {
  foreground?: string
  background?: string
  tabBar?: TabBarColorsConfig
}

export type HostConfig = {
  colorScheme?: string
  colorSchemes?: Record<string, ColorScheme>
  colors?: { tabBar?: TabBarColorsConfig }
  useFancyTabBar?: boolean
  tabBarAtBottom?: boolean
  hideTabBarIfOnlyOneTab?: boolean
  tabMaxWidth?: number
  unzoomOnSwitchPane?: boolean
  [key: string]: unknown
}

export type TextIntensity = 'Bold' | 'Half' | 'Normal'

export type FormatItem =
  | { type: 'background'; color: string }
  | { type: 'foreground'; color: string }
  | { type: 'attribute'; intensity: TextIntensity }
  | { type: 'text'; text: string }

export type FormatTabTitleHandler = (
  tab: TabInformation,
  tabs: TabInformation[],
  panes: PaneInformation[],
  hostConfig: HostConfig,
  hover: boolean,
  maxWidth: number,
) => FormatItem[]

export interface TerminalHost {
  mux: Mux
  on(event: 'format-tab-title', handler: FormatTabTitleHandler): void
}
