export interface AppConfig {
  planFile: string
  simulate: string | null
  excludeBreaks: boolean
  help: boolean
}

export type ViewMode = 'main' | 'full'

export type KeyCommand =
  | { type: 'exit' }
  | { type: 'switchView'; view: ViewMode }
  | { type: 'none' }
