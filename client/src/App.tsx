import { useEffect, useState } from 'react'
import { ThemeProvider, createTheme } from '@mui/material/styles'
import { Alert, Box, Button, Container, CssBaseline, Divider, Typography } from '@mui/material'
import AddIcon from '@mui/icons-material/Add'
import DownloadIcon from '@mui/icons-material/Download'
import type { AppConfigResponse, InvoiceField, SessionView, UploadOutcome } from 'shared'
import { InvoiceUploadForm } from './InvoiceUploadForm'
import { ExtractionStatusList } from './ExtractionStatusList'
import { LedgerSummaryCards } from './LedgerSummaryCards'
import { InvoiceTable } from './InvoiceTable'
import { checkFiles } from './utils/fileChecks'
import {
  addEntry,
  createSession,
  deleteEntry,
  discardSession,
  downloadExport,
  editEntry,
  getConfig,
  uploadInvoices,
} from './utils/api'

const theme = createTheme({ palette: { mode: 'dark' } })

const message = (err: unknown) => (err instanceof Error ? err.message : 'Unknown error')

function App() {
  const [config, setConfig] = useState<AppConfigResponse | null>(null)
  const [session, setSession] = useState<SessionView | null>(null)
  const [revision, setRevision] = useState(0)
  const [outcomes, setOutcomes] = useState<UploadOutcome[]>([])
  const [processing, setProcessing] = useState(0)
  const [error, setError] = useState<string | null>(null)

  useEffect(() => {
    let cancelled = false
    let sessionId: string | null = null

    const start = async () => {
      const [cfg, view] = await Promise.all([getConfig(), createSession()])
      sessionId = view.sessionId
      if (cancelled) {
        await discardSession(view.sessionId)
        return
      }
      setConfig(cfg)
      setSession(view)
    }
    start().catch((err) => setError(`Could not start a session: ${message(err)}`))

    const end = () => {
      if (sessionId) discardSession(sessionId).catch((err) => console.warn('Failed to discard session', err))
    }
    window.addEventListener('pagehide', end)
    return () => {
      cancelled = true
      window.removeEventListener('pagehide', end)
      end()
    }
  }, [])

  const applySession = (view: SessionView) => {
    setSession(view)
    setRevision((r) => r + 1)
  }

  const handleFilesSelected = async (files: File[]) => {
    if (!session || !config) return
    setError(null)

    const { accepted, rejected } = checkFiles(files, config)
    setOutcomes(rejected)
    if (!accepted.length) return

    setProcessing(accepted.length)
    try {
      const result = await uploadInvoices(session.sessionId, accepted)
      applySession(result.session)
      // Server outcomes come back in upload order; local rejections stay on top
      setOutcomes([...rejected, ...result.outcomes])
    } catch (err) {
      setError(`Upload failed: ${message(err)}`)
    } finally {
      setProcessing(0)
    }
  }

  const handleEdit = async (entryId: string, field: InvoiceField, value: string | null) => {
    if (!session) return
    try {
      const result = await editEntry(session.sessionId, entryId, field, value)
      applySession(result.session)
      setError(result.ok ? null : `Edit rejected: ${result.error}`)
    } catch (err) {
      setError(`Edit failed: ${message(err)}`)
    }
  }

  const handleDelete = async (entryId: string) => {
    if (!session) return
    try {
      applySession(await deleteEntry(session.sessionId, entryId))
    } catch (err) {
      setError(`Delete failed: ${message(err)}`)
    }
  }

  const handleAdd = async () => {
    if (!session) return
    try {
      applySession(await addEntry(session.sessionId))
    } catch (err) {
      setError(`Could not add a row: ${message(err)}`)
    }
  }

  const handleDownload = async () => {
    if (!session) return
    try {
      const blob = await downloadExport(session.sessionId)
      const url = URL.createObjectURL(blob)
      const link = document.createElement('a')
      link.href = url
      link.download = 'Invoice_Report.xlsx'
      link.click()
      URL.revokeObjectURL(url)
    } catch (err) {
      setError(`Export failed: ${message(err)}`)
    }
  }

  return (
    <ThemeProvider theme={theme}>
      <CssBaseline />
      <Container maxWidth="lg" sx={{ mt: 4, mb: 4 }}>
        <Typography variant="h4" sx={{ mb: 1 }}>
          AI Invoice Extraction
        </Typography>
        <Typography variant="subtitle1" color="text.secondary" sx={{ mb: 3 }}>
          Turn receipt photos into structured Excel data.
        </Typography>

        {error && (
          <Alert severity="error" sx={{ mb: 2 }} onClose={() => setError(null)}>
            {error}
          </Alert>
        )}

        <Box
          sx={{
            display: 'flex',
            flexDirection: { xs: 'column', md: 'row' },
            gap: 4,
          }}
        >
          <Box sx={{ flex: 1, minWidth: 260 }}>
            <InvoiceUploadForm
              disabled={!session}
              processing={processing}
              onFilesSelected={(files) => void handleFilesSelected(files)}
            />
          </Box>
          <Box sx={{ flex: 1.5, minWidth: 0 }}>
            <ExtractionStatusList outcomes={outcomes} />
          </Box>
        </Box>

        {session && (
          <>
            <Divider sx={{ my: 4 }} />
            <Typography variant="h6" sx={{ mb: 2 }}>
              Financial Overview
            </Typography>
            <LedgerSummaryCards summary={session.summary} />

            <Typography variant="h6" sx={{ mt: 4, mb: 2 }}>
              Review & Edit Data
            </Typography>
            <InvoiceTable
              entries={session.entries}
              revision={revision}
              onEdit={(entryId, field, value) => void handleEdit(entryId, field, value)}
              onDelete={(entryId) => void handleDelete(entryId)}
            />
            <Box sx={{ display: 'flex', gap: 2, mt: 2 }}>
              <Button startIcon={<AddIcon />} onClick={() => void handleAdd()}>
                Add row
              </Button>
              <Button
                variant="contained"
                startIcon={<DownloadIcon />}
                onClick={() => void handleDownload()}
                sx={{ ml: 'auto' }}
              >
                Download Report (.xlsx)
              </Button>
            </Box>
          </>
        )}
      </Container>
    </ThemeProvider>
  )
}

export default App
