import { readFile, writeFile } from 'node:fs/promises'
import { ErrorType, getSystemErrorCode, toAppError, type AppError } from '@/core/lib/errors'
import { makeLogger } from '@/core/lib/logger'

const log = makeLogger('files')

type FileAction = 'read' | 'write'

/**
 * UTF-8 text file access used by documents. Injected so tests and other
 * hosts can substitute their own storage.
 */
export interface FileService {
  readText(filePath: string): Promise<string>
  writeText(filePath: string, content: string): Promise<void>
}

function toFileError(action: FileAction, filePath: string, error: unknown): AppError {
  const detail =
    getSystemErrorCode(error) === 'ERR_ENCODING_INVALID_ENCODED_DATA' ? 'file is not valid UTF-8 text' : undefined
  return toAppError(error, ErrorType.IO, `Could not ${action} ${filePath}`, detail)
}

export class NodeFileService implements FileService {
  // fatal: reject malformed byte sequences instead of substituting U+FFFD
  private readonly decoder = new TextDecoder('utf-8', { fatal: true })

  async readText(filePath: string): Promise<string> {
    try {
      const bytes = await readFile(filePath)
      const text = this.decoder.decode(bytes)
      log.debug('Read file', filePath, { length: text.length })
      return text
    } catch (error) {
      throw toFileError('read', filePath, error)
    }
  }

  async writeText(filePath: string, content: string): Promise<void> {
    try {
      await writeFile(filePath, content, 'utf8')
      log.debug('Wrote file', filePath, { length: content.length })
    } catch (error) {
      throw toFileError('write', filePath, error)
    }
  }
}

export const fileService = new NodeFileService()
