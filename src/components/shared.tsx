import type { ReactNode } from 'react'
import { Box, Text } from 'ink'

const DIVIDER_WIDTH = 40

export function Divider(): ReactNode {
  return <Text color="cyan">{'='.repeat(DIVIDER_WIDTH)}</Text>
}

export function NoScheduleMessage(): ReactNode {
  return (
    <Box marginBottom={1}>
      <Text color="white">No schedule found for today.</Text>
    </Box>
  )
}
