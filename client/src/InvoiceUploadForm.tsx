import { useRef, type ChangeEvent } from 'react'
import { Box, Button, LinearProgress, Typography } from '@mui/material'
import UploadFileIcon from '@mui/icons-material/UploadFile'

interface Props {
  disabled: boolean
  processing: number
  onFilesSelected: (files: File[]) => void
}

export function InvoiceUploadForm({ disabled, processing, onFilesSelected }: Props) {
  const inputRef = useRef<HTMLInputElement>(null)

  const handleChange = (e: ChangeEvent<HTMLInputElement>) => {
    const files = e.target.files ? Array.from(e.target.files) : []
    // Allow selecting the same files again after a failed extraction
    e.target.value = ''
    if (files.length) onFilesSelected(files)
  }

  return (
    <Box sx={{ display: 'flex', flexDirection: 'column', gap: 2 }}>
      <Typography variant="h6">Upload Documents</Typography>
      <Button
        variant="contained"
        size="large"
        startIcon={<UploadFileIcon />}
        disabled={disabled || processing > 0}
        onClick={() => inputRef.current?.click()}
      >
        Select invoice images
      </Button>
      <input
        ref={inputRef}
        type="file"
        accept="image/png,image/jpeg"
        multiple
        hidden
        onChange={handleChange}
      />
      <Typography variant="caption" color="text.secondary">
        JPG or PNG. Each image is sent to the extraction model once.
      </Typography>
      {processing > 0 && (
        <Box>
          <Typography variant="body2" sx={{ mb: 1 }}>
            Extracting {processing} {processing === 1 ? 'invoice' : 'invoices'}...
          </Typography>
          <LinearProgress />
        </Box>
      )}
    </Box>
  )
}
