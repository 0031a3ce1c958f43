import { describe, it, expect } from 'vitest'
import { checkFiles } from '../fileChecks'

const limits = { acceptedMimeTypes: ['image/jpeg', 'image/jpg', 'image/png'], maxFileSize: 1024 * 1024 }

describe('checkFiles', () => {
  it('keeps images within the limits in selection order', () => {
    const a = new File(['a'], 'a.png', { type: 'image/png' })
    const b = new File(['b'], 'b.jpg', { type: 'image/jpeg' })

    expect(checkFiles([a, b], limits)).toEqual({ accepted: [a, b], rejected: [] })
  })

  it('rejects other types and oversized files', () => {
    const pdf = new File(['%PDF'], 'invoice.pdf', { type: 'application/pdf' })
    const big = new File([new Uint8Array(2 * 1024 * 1024)], 'big.png', { type: 'image/png' })

    expect(checkFiles([pdf, big], limits).rejected).toEqual([
      { fileName: 'invoice.pdf', status: 'rejected', error: 'Only JPEG and PNG images are accepted' },
      { fileName: 'big.png', status: 'rejected', error: 'Max file size is 1MB' },
    ])
  })
})
