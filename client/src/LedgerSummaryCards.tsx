import { Box, LinearProgress, Paper, Typography } from '@mui/material'
import type { LedgerSummary } from 'shared'
import { formatTotals } from './utils/formatAmount'

function Metric({ label, value }: { label: string; value: string }) {
  return (
    <Paper sx={{ p: 2, flex: 1, minWidth: 160 }}>
      <Typography variant="caption" color="text.secondary">
        {label}
      </Typography>
      <Typography variant="h6">{value}</Typography>
    </Paper>
  )
}

export function LedgerSummaryCards({ summary }: { summary: LedgerSummary }) {
  const maxCount = Math.max(1, ...summary.byCategory.map((c) => c.count))

  return (
    <Box sx={{ display: 'flex', flexDirection: 'column', gap: 2 }}>
      <Box sx={{ display: 'flex', gap: 2, flexWrap: 'wrap' }}>
        <Metric label="Total Extracted" value={`${summary.invoiceCount} Invoices`} />
        <Metric label="Total Spending" value={formatTotals(summary.totalsByCurrency)} />
        <Metric label="Top Category" value={summary.topCategory ?? 'N/A'} />
      </Box>
      {summary.byCategory.map((c) => (
        <Box key={c.category}>
          <Typography variant="body2">
            {c.category} ({c.count}) · {formatTotals(c.totals)}
          </Typography>
          <LinearProgress variant="determinate" value={(c.count / maxCount) * 100} />
        </Box>
      ))}
    </Box>
  )
}
