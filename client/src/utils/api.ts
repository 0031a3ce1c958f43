import type {
  AppConfigResponse,
  EditRejectedResponse,
  InvoiceField,
  SessionView,
  UploadResponse,
} from 'shared'

export class ApiError extends Error {
  constructor(message: string, readonly status: number) {
    super(message)
    this.name = 'ApiError'
  }
}

export type EditEntryResult =
  | { ok: true; session: SessionView }
  | { ok: false; error: string; session: SessionView }

const errorMessage = async (res: Response): Promise<string> => {
  const text = await res.text()
  try {
    const body: unknown = JSON.parse(text)
    if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
      return body.error
    }
  } catch {
    return text || `HTTP ${res.status}`
  }
  return `HTTP ${res.status}`
}

const request = async <T>(path: string, init?: RequestInit): Promise<T> => {
  const res = await fetch(path, init)
  if (!res.ok) {
    throw new ApiError(await errorMessage(res), res.status)
  }
  return res.json()
}

const sessionPath = (sessionId: string) => `/api/sessions/${encodeURIComponent(sessionId)}`

export const getConfig = () => request<AppConfigResponse>('/api/config')

export const createSession = () => request<SessionView>('/api/sessions', { method: 'POST' })

export const discardSession = async (sessionId: string): Promise<void> => {
  // keepalive lets the request outlive the page on unload
  const res = await fetch(sessionPath(sessionId), { method: 'DELETE', keepalive: true })
  if (!res.ok && res.status !== 404) {
    throw new ApiError(await errorMessage(res), res.status)
  }
}

export const uploadInvoices = (sessionId: string, files: File[]) => {
  const form = new FormData()
  for (const file of files) form.append('files', file)
  return request<UploadResponse>(`${sessionPath(sessionId)}/invoices`, { method: 'POST', body: form })
}

export const addEntry = (sessionId: string) =>
  request<SessionView>(`${sessionPath(sessionId)}/entries`, { method: 'POST' })

export const deleteEntry = (sessionId: string, entryId: string) =>
  request<SessionView>(`${sessionPath(sessionId)}/entries/${encodeURIComponent(entryId)}`, {
    method: 'DELETE',
  })

export const editEntry = async (
  sessionId: string,
  entryId: string,
  field: InvoiceField,
  value: string | number | null
): Promise<EditEntryResult> => {
  const res = await fetch(`${sessionPath(sessionId)}/entries/${encodeURIComponent(entryId)}`, {
    method: 'PATCH',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ field, value }),
  })

  if (res.status === 422) {
    const rejected: EditRejectedResponse = await res.json()
    return { ok: false, error: rejected.error, session: rejected.session }
  }
  if (!res.ok) {
    throw new ApiError(await errorMessage(res), res.status)
  }
  const session: SessionView = await res.json()
  return { ok: true, session }
}

export const downloadExport = async (sessionId: string): Promise<Blob> => {
  const res = await fetch(`${sessionPath(sessionId)}/export`)
  if (!res.ok) {
    throw new ApiError(await errorMessage(res), res.status)
  }
  return res.blob()
}
