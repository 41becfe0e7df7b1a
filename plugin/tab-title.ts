import { truncateRight } from '../shared/text-width.js'
import type { TabInformation } from './host-types.js'
import { lookupIcon } from './icons.js'
import type { TabBarSettings } from './settings.js'

export const UNKNOWN_PROCESS = 'unknown'

// Cells kept free for the index, its decoration and padding.
const RESERVED_CELLS = 3

export type ParsedTitle = {
  process: string
  custom: string
}

/**
 * Splits `"proc - custom"` into its leading process token and the trimmed
 * text after the dash. Without a dash after the process token, `custom` is
 * empty and the caller shows the full title.
 */
export function parseTitle(title: string): ParsedTitle {
  const token = /^\S+/.exec(title)
  if (!token) return { process: UNKNOWN_PROCESS, custom: '' }

  const separated = /^\s*-(.*)$/s.exec(title.slice(token[0].length))
  return { process: token[0], custom: separated ? separated[1].trim() : '' }
}

export function resolveTabTitleSource(tab: TabInformation): string {
  return tab.tabTitle && tab.tabTitle.length > 0 ? tab.tabTitle : tab.activePane.title
}

export function resolveDisplayTitle(title: string, maxWidth: number): string {
  const { custom } = parseTitle(title)
  return truncateRight(custom !== '' ? custom : title, maxWidth - RESERVED_CELLS)
}

export function formatTabTitle(tab: TabInformation, settings: TabBarSettings, maxWidth: number): string {
  const source = resolveTabTitleSource(tab)
  const { process } = parseTitle(source)
  const icon = lookupIcon(settings.ui.icons, process)
  return ` ${icon} ${resolveDisplayTitle(source, maxWidth)} `
}
