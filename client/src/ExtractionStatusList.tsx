import { Alert, Stack } from '@mui/material'
import type { UploadOutcome } from 'shared'

const severity = {
  parsed: 'success',
  degraded: 'warning',
  rejected: 'error',
  failed: 'error',
} as const

function describe(outcome: UploadOutcome): string {
  switch (outcome.status) {
    case 'parsed':
      return `${outcome.fileName}: extracted`
    case 'degraded':
      return `${outcome.fileName}: extracted with missing fields, please review the highlighted cells`
    case 'rejected':
      return `${outcome.fileName}: skipped (${outcome.error ?? 'not accepted'})`
    case 'failed':
      return `${outcome.fileName}: ${outcome.error ?? 'extraction failed'}. Upload it again to retry.`
  }
}

export function ExtractionStatusList({ outcomes }: { outcomes: UploadOutcome[] }) {
  if (!outcomes.length) return null

  return (
    <Stack spacing={1}>
      {outcomes.map((outcome, idx) => (
        <Alert key={outcome.fileName + idx} severity={severity[outcome.status]} variant="outlined">
          {describe(outcome)}
        </Alert>
      ))}
    </Stack>
  )
}
