import dayjs from 'dayjs';
import fs from 'fs-extra';
import path from 'path';
import { logger } from '../utils/logger.js';

export const RULE = '='.repeat(80);
export const THIN_RULE = '-'.repeat(80);

export interface TranscriptHeader {
  title: string;
  database: string;
  collection: string;
}

/** Append-only text transcript, e.g. `explain_out_<epoch>.txt`. */
export class TranscriptWriter {
  private filePath: string;
  private writeStream: fs.WriteStream | null = null;

  constructor(outputDir: string, epochSeconds: number = dayjs().unix(), prefix = 'explain_out') {
    fs.ensureDirSync(outputDir);
    this.filePath = path.join(outputDir, `${prefix}_${epochSeconds}.txt`);
  }

  async open(header: TranscriptHeader) {
    this.writeStream = fs.createWriteStream(this.filePath, { flags: 'w', encoding: 'utf-8' });
    logger.info(`Transcript file created: ${this.filePath}`);

    await this.write(`${header.title}\n`);
    await this.write(`Generated: ${dayjs().toISOString()}\n`);
    await this.write(`Database: ${header.database}\n`);
    await this.write(`Collection: ${header.collection}\n`);
    await this.write(`${RULE}\n\n`);
  }

  async write(content: string): Promise<void> {
    const stream = this.writeStream;
    if (!stream) throw new Error('Writer not opened');

    return new Promise((resolve, reject) => {
      stream.write(content, err => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  async close() {
    const stream = this.writeStream;
    if (stream) {
      this.writeStream = null;
      await new Promise<void>(resolve => {
        stream.end(() => {
          logger.info('Transcript file closed');
          resolve();
        });
      });
    }
  }

  getFilePath() {
    return this.filePath;
  }
}
