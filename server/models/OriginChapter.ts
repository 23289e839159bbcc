import mongoose from "mongoose";

const OriginChapterSchema = new mongoose.Schema(
  {
    novel_id: { type: String, required: true, index: true },
    chapter_number: { type: Number, required: true },
    title: { type: String, default: null },
    text_content: { type: String, default: "" },
    character_count: { type: Number, default: 0 },
    created_at: { type: Date, default: Date.now },
    updated_at: { type: Date, default: Date.now },
  },
  { collection: "origin_chapters" },
);

OriginChapterSchema.index({ novel_id: 1, chapter_number: 1 }, { unique: true });

export type OriginChapterDocument = mongoose.InferSchemaType<
  typeof OriginChapterSchema
>;

export default mongoose.model<OriginChapterDocument>(
  "OriginChapter",
  OriginChapterSchema,
);
