/**
 * Shared Types - 統合エクスポート
 */

// === Result型とその基本操作 ===
export {
  type Result,
  Ok,
  Err,
  map,
  flatMap,
  mapError,
  match,
  firstFailure,
  parseWith
} from './result';

// === パイプライン処理 ===
export { type ResultPipe, resultPipe } from './pipeline';

// === ドメイン固有のブランド型 ===
export {
  type EventId,
  type BlockHeight,
  type Principal,
  EventIdSchema,
  BlockHeightSchema
} from './brand-types';

// === 名前空間アクセス ===
import * as ResultNamespace from './result';

export { ResultNamespace as ResultUtils };
