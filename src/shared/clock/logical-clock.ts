import { BlockHeightSchema, type BlockHeight } from '../types/index';

/**
 * 論理クロック
 *
 * 外部環境から供給される単調非減少の序数。エンジン自身は進めない
 */
export interface LogicalClock {
  now(): number;
}

/**
 * 手動で進める論理クロック（テスト・シミュレーション用）
 */
export class ManualClock implements LogicalClock {
  private height: BlockHeight;

  constructor(initialHeight: number = 0) {
    this.height = ManualClock.toHeight(initialHeight);
  }

  now(): BlockHeight {
    return this.height;
  }

  /**
   * 指定ブロック数だけ進める
   */
  advance(blocks: number = 1): BlockHeight {
    if (!Number.isInteger(blocks) || blocks < 0) {
      throw new RangeError(`Clock can only advance by a non-negative integer, got ${blocks}`);
    }
    this.height = ManualClock.toHeight(this.height + blocks);
    return this.height;
  }

  set(height: number): BlockHeight {
    const next = ManualClock.toHeight(height);
    if (next < this.height) {
      throw new RangeError(`Clock cannot move backwards from ${this.height} to ${next}`);
    }
    this.height = next;
    return this.height;
  }

  private static toHeight(value: number): BlockHeight {
    const parsed = BlockHeightSchema.safeParse(value);
    if (!parsed.success) {
      throw new RangeError(`Invalid block height: ${value}`);
    }
    return parsed.data;
  }
}
