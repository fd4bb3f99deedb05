/**
 * PunctuationStage - 标点处理阶段
 * 职责：在下游文本引擎（音素化 / TTS 前端等）前后处理标点
 * - preserve：preserve -> 下游处理 chunk -> restore
 * - remove：去除标点后直接交给下游
 */

import logger from '../logger';
import { PunctuationConfig, PunctuationMode, DEFAULT_PUNCTUATION_CONFIG } from '../punctuation-config';
import { Punctuation, configure } from './punctuation';
import { toList } from './punctuation-types';

/** 下游文本引擎：必须保持 chunk 的数量与顺序 */
export interface TextChunkProcessor {
  processChunks(chunks: string[]): Promise<string[]>;
}

export interface PunctuationStageResult {
  lines: string[];
  mode: PunctuationMode;
  chunkCount: number;  // 交给下游的 chunk 数
  markCount: number;  // 保留的标点记录数（remove 模式为 0）
  elapsedMs: number;
}

export class PunctuationStage {
  private readonly punctuation: Punctuation;
  private readonly mode: PunctuationMode;

  constructor(config: Partial<PunctuationConfig> = {}) {
    this.punctuation = configure(config.marks ?? DEFAULT_PUNCTUATION_CONFIG.marks);
    this.mode = config.mode ?? DEFAULT_PUNCTUATION_CONFIG.mode;
  }

  async process(text: string | readonly string[], processor: TextChunkProcessor): Promise<PunctuationStageResult> {
    const startTime = Date.now();
    const lines = toList(text);

    if (lines.length === 0) {
      return { lines: [], mode: this.mode, chunkCount: 0, markCount: 0, elapsedMs: 0 };
    }

    if (this.mode === 'remove') {
      const stripped = this.punctuation.remove(lines);
      const processed = await this.runProcessor(processor, stripped);
      return {
        lines: processed,
        mode: this.mode,
        chunkCount: stripped.length,
        markCount: 0,
        elapsedMs: Date.now() - startTime,
      };
    }

    const { chunks, marks } = this.punctuation.preserve(lines);
    const processed = chunks.length > 0 ? await this.runProcessor(processor, chunks) : [];

    if (processed.length !== chunks.length) {
      // 下游未保持 chunk 数量，恢复结果会降级，但不中断
      logger.warn(
        {
          expected: chunks.length,
          received: processed.length,
          markCount: marks.length,
        },
        'PunctuationStage: Processor changed chunk count, restored text may be misaligned'
      );
    }

    const restored = this.punctuation.restore(processed, marks);
    const elapsedMs = Date.now() - startTime;

    logger.debug(
      {
        lineCount: lines.length,
        chunkCount: chunks.length,
        markCount: marks.length,
        elapsedMs,
      },
      'PunctuationStage: Punctuation restored'
    );

    return {
      lines: restored,
      mode: this.mode,
      chunkCount: chunks.length,
      markCount: marks.length,
      elapsedMs,
    };
  }

  private async runProcessor(processor: TextChunkProcessor, chunks: string[]): Promise<string[]> {
    try {
      return await processor.processChunks(chunks);
    } catch (error) {
      logger.error(
        {
          error: error instanceof Error ? error.message : String(error),
          chunkCount: chunks.length,
          mode: this.mode,
        },
        'PunctuationStage: Text processor failed'
      );
      throw error;
    }
  }
}
