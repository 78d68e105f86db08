import type { ReactNode } from 'react'
import { Box, Text } from 'ink'
import type { DaySchedule, Evaluation, PlanEvent } from '@/types'
import { formatEventMain } from '@/lib/eventFormat'
import { formatLongDateTime } from '@/lib/timeUtils'
import { Divider, NoScheduleMessage } from './shared'

// Remaining time turns blue below this many minutes
const LOW_REMAINING_MINUTES = 15

const TIME_REMAINING_LABEL = 'Time remaining:     '

export interface MainViewProps {
  now: Date
  day: DaySchedule | null
  evaluation: Evaluation
}

function EventSection({ title, event, color }: { title: string; event: PlanEvent; color: string }): ReactNode {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text color={color} bold>{title}</Text>
      <Box paddingLeft={2}>
        <Text color={color}>{formatEventMain(event)}</Text>
      </Box>
    </Box>
  )
}

function Message({ children }: { children: string }): ReactNode {
  return (
    <Box marginBottom={1}>
      <Text color="white">{children}</Text>
    </Box>
  )
}

function InProgress({ event, remainingMinutes }: { event: PlanEvent; remainingMinutes: number }): ReactNode {
  const remainingColor = remainingMinutes < LOW_REMAINING_MINUTES ? 'blue' : 'magenta'
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text color="green" bold>{'>> In-progress event:'}</Text>
      <Box paddingLeft={2} flexDirection="column">
        <Text color="green">{formatEventMain(event)}</Text>
        <Text color="green">
          {TIME_REMAINING_LABEL}
          <Text color={remainingColor}>{`${remainingMinutes} minutes`}</Text>
        </Text>
      </Box>
    </Box>
  )
}

function ScheduleBody({ evaluation }: { evaluation: Evaluation }): ReactNode {
  const { current, upcoming, remainingMinutes } = evaluation

  if (current && remainingMinutes !== null) {
    return (
      <>
        <InProgress event={current} remainingMinutes={remainingMinutes} />
        {upcoming.length > 0 ? (
          <EventSection title="Next upcoming event:" event={upcoming[0]} color="white" />
        ) : (
          <Message>No further events for today.</Message>
        )}
      </>
    )
  }

  if (upcoming.length > 0) {
    return (
      <>
        <EventSection title="Upcoming event:" event={upcoming[0]} color="yellow" />
        {upcoming.length > 1 && (
          <EventSection title="Next upcoming event:" event={upcoming[1]} color="white" />
        )}
      </>
    )
  }

  return <Message>No event currently in progress.</Message>
}

export function MainView({ now, day, evaluation }: MainViewProps): ReactNode {
  return (
    <Box flexDirection="column">
      <Text color="cyan" bold>Plan Scheduler</Text>
      <Text color="white">{`Current Date & Time: ${formatLongDateTime(now)}`}</Text>
      <Divider />
      <Box flexDirection="column" marginTop={1}>
        {day ? <ScheduleBody evaluation={evaluation} /> : <NoScheduleMessage />}
      </Box>
    </Box>
  )
}
