import type { ReactNode } from 'react'
import { Box, Text } from 'ink'
import type { DaySchedule } from '@/types'
import { formatEvent } from '@/lib/eventFormat'
import { sortEvents } from '@/lib/scheduleEvaluator'
import { Divider, NoScheduleMessage } from './shared'

export interface FullScheduleViewProps {
  day: DaySchedule | null
}

export function FullScheduleView({ day }: FullScheduleViewProps): ReactNode {
  return (
    <Box flexDirection="column">
      <Text color="cyan" bold>{"Today's Full Schedule"}</Text>
      <Divider />
      <Box flexDirection="column" marginTop={1}>
        {day ? (
          <Box flexDirection="column" paddingLeft={2} marginBottom={1}>
            {sortEvents(day.events).map((event, index) => (
              <Text key={index} color="white">{formatEvent(event)}</Text>
            ))}
          </Box>
        ) : (
          <NoScheduleMessage />
        )}
      </Box>
    </Box>
  )
}
