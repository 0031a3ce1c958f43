import type { AppConfigResponse, UploadOutcome } from 'shared'

export interface FileCheckResult {
  accepted: File[]
  rejected: UploadOutcome[]
}

/**
 * Splits a selection into files worth uploading and local rejections, using
 * the limits the server reports. The server re-checks everything it receives.
 */
export function checkFiles(
  files: File[],
  { acceptedMimeTypes, maxFileSize }: Pick<AppConfigResponse, 'acceptedMimeTypes' | 'maxFileSize'>
): FileCheckResult {
  const accepted: File[] = []
  const rejected: UploadOutcome[] = []

  for (const file of files) {
    if (!acceptedMimeTypes.includes(file.type.toLowerCase())) {
      rejected.push({ fileName: file.name, status: 'rejected', error: 'Only JPEG and PNG images are accepted' })
    } else if (file.size > maxFileSize) {
      rejected.push({
        fileName: file.name,
        status: 'rejected',
        error: `Max file size is ${maxFileSize / 1024 / 1024}MB`,
      })
    } else {
      accepted.push(file)
    }
  }

  return { accepted, rejected }
}
