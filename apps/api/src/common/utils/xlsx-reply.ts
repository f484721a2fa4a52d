import type { FastifyReply } from 'fastify';
import { XLSX_CONTENT_TYPE } from '../../modules/export/xlsx-renderer.service';

/**
 * Send a workbook as a download. The file name is reduced to printable ASCII
 * without quotes so it cannot break the Content-Disposition header.
 */
export function sendWorkbook(reply: FastifyReply, buffer: Buffer, fileName: string): void {
  const safeFileName = fileName
    .replace(/[\r\n\t]/g, '')
    .replace(/["\\]/g, '_')
    .replace(/[^\x20-\x7E]/g, '_');

  reply
    .header('Content-Type', XLSX_CONTENT_TYPE)
    .header('Content-Disposition', `attachment; filename="${safeFileName}"`)
    .header('Content-Length', buffer.length)
    .send(buffer);
}
