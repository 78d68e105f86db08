import { useEffect, useState, type ReactNode } from 'react'
import { useApp, useInput } from 'ink'
import type { ParseResult } from '@/types'
import type { Clock } from '@/lib/clock'
import { evaluate, findDay } from '@/lib/scheduleEvaluator'
import { msUntilNextMinute, toCalendarDate } from '@/lib/timeUtils'
import { resolveKeyCommand, useViewStore } from '@/stores/viewStore'
import { MainView } from './MainView'
import { FullScheduleView } from './FullScheduleView'

export interface DashboardProps {
  result: ParseResult
  clock: Clock
  excludeBreaks: boolean
}

export function Dashboard({ result, clock, excludeBreaks }: DashboardProps): ReactNode {
  const { exit } = useApp()
  const view = useViewStore((s) => s.view)
  const showMain = useViewStore((s) => s.showMain)
  const showFullSchedule = useViewStore((s) => s.showFullSchedule)
  const [now, setNow] = useState(() => clock())

  // Re-evaluate on every wall-clock minute boundary
  useEffect(() => {
    let timer: ReturnType<typeof setTimeout> | undefined
    const scheduleTick = (): void => {
      timer = setTimeout(() => {
        setNow(clock())
        scheduleTick()
      }, msUntilNextMinute(new Date()))
    }
    scheduleTick()
    return () => clearTimeout(timer)
  }, [clock])

  useInput((input) => {
    const command = resolveKeyCommand(view, input)
    switch (command.type) {
      case 'exit':
        exit()
        break
      case 'switchView':
        if (command.view === 'full') {
          showFullSchedule()
        } else {
          showMain()
        }
        setNow(clock())
        break
      case 'none':
        break
    }
  })

  const day = findDay(result, toCalendarDate(now))

  if (view === 'full') {
    return <FullScheduleView day={day} />
  }

  const evaluation = evaluate(day, now, { excludeBreaks })
  return <MainView now={now} day={day} evaluation={evaluation} />
}
