import type { LoadedDocument, Logger } from '@ledgerlock/types';

/** Close a loaded document; a failing close is logged, never thrown. */
export async function closeDocument(document: LoadedDocument, logger: Logger): Promise<void> {
  try {
    await document.close();
  } catch (error) {
    logger.warn('Closing document failed', { error: error instanceof Error ? error.message : String(error) });
  }
}
