import mongoose from "mongoose";

import OriginChapter from "../../models/OriginChapter";
import type { ChapterSummary } from "./taskGraph";

export interface ChapterContent extends ChapterSummary {
  novelId: string;
  text: string;
}

/** Read-only view of the novel text. The pipeline never writes chapters. */
export interface ContentStore {
  listChapters(novelId: string): Promise<ChapterSummary[]>;
  fetchChapter(novelId: string, chapterId: string): Promise<ChapterContent | null>;
}

export class MongoContentStore implements ContentStore {
  async listChapters(novelId: string): Promise<ChapterSummary[]> {
    const docs = await OriginChapter.find(
      { novel_id: novelId },
      { text_content: 0 },
    )
      .sort({ chapter_number: 1 })
      .lean();

    return docs.map((doc) => ({
      chapterId: String(doc._id),
      chapterNumber: doc.chapter_number,
      title: doc.title ?? null,
      characterCount: doc.character_count ?? 0,
    }));
  }

  async fetchChapter(
    novelId: string,
    chapterId: string,
  ): Promise<ChapterContent | null> {
    if (!mongoose.isValidObjectId(chapterId)) {
      return null;
    }
    const doc = await OriginChapter.findOne({
      _id: chapterId,
      novel_id: novelId,
    }).lean();
    if (!doc) {
      return null;
    }
    const text = doc.text_content ?? "";
    return {
      novelId,
      chapterId: String(doc._id),
      chapterNumber: doc.chapter_number,
      title: doc.title ?? null,
      characterCount: doc.character_count || text.length,
      text,
    };
  }
}
