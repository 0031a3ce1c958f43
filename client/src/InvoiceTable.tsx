import { useState } from 'react'
import {
  Chip,
  IconButton,
  MenuItem,
  Paper,
  Select,
  Table,
  TableBody,
  TableCell,
  TableContainer,
  TableHead,
  TableRow,
  TextField,
  Tooltip,
} from '@mui/material'
import DeleteIcon from '@mui/icons-material/Delete'
import { INVOICE_CATEGORIES, type InvoiceField, type LedgerEntry } from 'shared'

type TextFieldName = Exclude<InvoiceField, 'category'>

interface Props {
  entries: LedgerEntry[]
  revision: number
  onEdit: (entryId: string, field: InvoiceField, value: string | null) => void
  onDelete: (entryId: string) => void
}

const inputTypes: Record<TextFieldName, string> = {
  date: 'date',
  vendor: 'text',
  amount: 'text',
  currency: 'text',
}

const toDraft = (value: string | number | null) => (value === null ? '' : String(value))

function EditableCell({
  entry,
  field,
  onCommit,
}: {
  entry: LedgerEntry
  field: TextFieldName
  onCommit: (value: string | null) => void
}) {
  const stored = toDraft(entry.record[field])
  const [draft, setDraft] = useState(stored)
  const missing = entry.missingFields.includes(field)

  const commit = () => {
    if (draft !== stored) onCommit(draft.trim() ? draft : null)
  }

  return (
    <TextField
      size="small"
      variant="standard"
      type={inputTypes[field]}
      value={draft}
      error={missing}
      placeholder={missing ? 'unknown' : undefined}
      inputProps={field === 'amount' ? { inputMode: 'decimal' } : undefined}
      onChange={(e) => setDraft(e.target.value)}
      onBlur={commit}
      onKeyDown={(e) => {
        if (e.key === 'Enter') commit()
      }}
      fullWidth
    />
  )
}

export function InvoiceTable({ entries, revision, onEdit, onDelete }: Props) {
  const fields: TextFieldName[] = ['date', 'vendor', 'amount', 'currency']

  return (
    <TableContainer component={Paper} sx={{ maxWidth: '100%', overflowX: 'auto' }}>
      <Table size="small">
        <TableHead>
          <TableRow>
            <TableCell>Date</TableCell>
            <TableCell>Vendor</TableCell>
            <TableCell>Amount</TableCell>
            <TableCell>Curr</TableCell>
            <TableCell>Category</TableCell>
            <TableCell>Source</TableCell>
            <TableCell />
          </TableRow>
        </TableHead>
        <TableBody>
          {entries.map((entry) => (
            <TableRow key={entry.id}>
              {fields.map((field) => (
                <TableCell key={field}>
                  {/* Remount on every server response so drafts fall back to the stored value */}
                  <EditableCell
                    key={`${revision}-${toDraft(entry.record[field])}`}
                    entry={entry}
                    field={field}
                    onCommit={(value) => onEdit(entry.id, field, value)}
                  />
                </TableCell>
              ))}
              <TableCell>
                <Select
                  size="small"
                  variant="standard"
                  value={entry.record.category}
                  onChange={(e) => onEdit(entry.id, 'category', e.target.value)}
                >
                  {INVOICE_CATEGORIES.map((c) => (
                    <MenuItem key={c} value={c}>
                      {c}
                    </MenuItem>
                  ))}
                </Select>
              </TableCell>
              <TableCell>
                {entry.status === 'manual' ? (
                  <Chip size="small" label="manual" />
                ) : (
                  <Tooltip title={entry.status === 'degraded' ? 'Some fields could not be read' : ''}>
                    <Chip
                      size="small"
                      color={entry.status === 'degraded' ? 'warning' : 'default'}
                      label={entry.sourceFile}
                    />
                  </Tooltip>
                )}
              </TableCell>
              <TableCell>
                <IconButton size="small" aria-label="delete" onClick={() => onDelete(entry.id)}>
                  <DeleteIcon fontSize="small" />
                </IconButton>
              </TableCell>
            </TableRow>
          ))}
        </TableBody>
      </Table>
    </TableContainer>
  )
}
