import { create } from 'zustand'
import type { KeyCommand, ViewMode } from '@/types'

interface ViewStore {
  view: ViewMode

  showMain: () => void
  showFullSchedule: () => void
}

export const useViewStore = create<ViewStore>((set) => ({
  view: 'main',

  showMain: () => set({ view: 'main' }),
  showFullSchedule: () => set({ view: 'full' }),
}))

/**
 * Map a key press to a command for the given view.
 * Main view: q quits, t opens the full schedule. Full view: q returns to main.
 */
export function resolveKeyCommand(view: ViewMode, input: string): KeyCommand {
  if (view === 'main') {
    if (input === 'q') return { type: 'exit' }
    if (input === 't') return { type: 'switchView', view: 'full' }
    return { type: 'none' }
  }

  if (input === 'q') return { type: 'switchView', view: 'main' }
  return { type: 'none' }
}
