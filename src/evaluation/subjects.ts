// Отображение результатов поиска на идентификаторы субъектов разметки.
import type { HybridResult } from '../search/types.js';

// Ground truth размечен по video_id: релевантен любой документ этого видео.
// Документ без video_id сравнивается по собственному id.
export function subjectIdOf(result: HybridResult): string {
  return result.keywordFields.video_id || result.documentId;
}

export function toSubjectIds(results: readonly HybridResult[]): string[] {
  return results.map(subjectIdOf);
}
