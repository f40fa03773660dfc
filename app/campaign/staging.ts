// purpose: hash uploaded files into staged file records for runs, analyses and attachments
// status: experimental

import type { StagingPrefix } from '../config/campaign'
import type { Attachment, FastqFile, StagedFile } from '../types'

export interface StageableFile {
  name: string
  arrayBuffer: () => Promise<ArrayBuffer>
}

export const toHex = (buffer: ArrayBuffer): string =>
  Array.from(new Uint8Array(buffer), (byte) => byte.toString(16).padStart(2, '0')).join('')

export const sha256Hex = async (data: ArrayBuffer): Promise<string> => {
  const subtle = globalThis.crypto?.subtle
  if (!subtle) {
    throw new Error('Web Crypto is unavailable; cannot hash staged files')
  }
  return toHex(await subtle.digest('SHA-256', data))
}

export const stagedUri = (prefix: StagingPrefix, filename: string): string =>
  `file://${prefix}/${encodeURIComponent(filename)}`

export const stageFile = async (file: StageableFile, prefix: StagingPrefix): Promise<StagedFile> => {
  const data = await file.arrayBuffer()
  return {
    uri: stagedUri(prefix, file.name),
    sha256: await sha256Hex(data),
    size_bytes: data.byteLength,
  }
}

export const stageFiles = (files: readonly StageableFile[], prefix: StagingPrefix): Promise<StagedFile[]> =>
  Promise.all(files.map((file) => stageFile(file, prefix)))

export const stageFastq = async (
  read: FastqFile['read'],
  file: StageableFile,
  prefix: StagingPrefix,
): Promise<FastqFile> => ({ read, ...(await stageFile(file, prefix)) })

export const stageAttachment = async (file: StageableFile, prefix: StagingPrefix): Promise<Attachment> => ({
  ...(await stageFile(file, prefix)),
  description: file.name,
})
