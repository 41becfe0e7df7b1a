// Nerd Font glyphs.
export const UNKNOWN_PROCESS_ICON = '\u{eb32}'

export const defaultIcons: Record<string, string> = {
  debug: '\u{eb8e}',
  bash: '\u{ebca}',
  cargo: '\u{e7a8}',
  curl: '\u{f078d}',
  docker: '\u{f308}',
  'docker-compose': '\u{f308}',
  gh: '\u{e709}',
  git: '\u{e702}',
  go: '\u{e627}',
  kubectl: '\u{f308}',
  lua: '\u{e620}',
  make: '\u{e673}',
  node: '\u{f02d8}',
  nvim: '\u{e62b}',
  sudo: '\u{f292}',
  vim: '\u{e7c5}',
  wget: '\u{f06c0}',
  zsh: '\u{e795}',
  lazygit: '\u{e708}',
}

/**
 * Exact, case-insensitive lookup of a process name in the icon table.
 * Table keys are expected in lowercase.
 */
export function lookupIcon(icons: Record<string, string>, processName: string): string {
  const key = processName.toLowerCase()
  return Object.prototype.hasOwnProperty.call(icons, key) ? icons[key] : UNKNOWN_PROCESS_ICON
}
