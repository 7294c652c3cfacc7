import type { Section } from "@/lib/validators/input";
import type { MessageLineSlide, Slide } from "@/lib/validators/output-schema";

export const sampleSections: Section[] = [
  { title: "強み", content: "チームを率いてプロジェクトを完遂した" },
  { title: "志望動機", content: "チームで成果を出す文化に惹かれた" }
];

export const samplePlan: MessageLineSlide[] = [
  { title: "自己紹介", message_line: "チームを率いて成果を出してきたので、貴社でも推進役になれる" },
  { title: "強み: 推進力", message_line: "プロジェクトを完遂させた推進力は新規事業でも活きる" },
  { title: "まとめ", message_line: "推進力を活かして入社後すぐにチームへ貢献したい" }
];

export function buildThreeSlides(): Slide[] {
  return [
    { title: "自己紹介", bullets: ["チームを率いて成果を出してきた", "背景"] },
    { title: "強み", bullets: ["推進力がある", "具体例"] },
    { title: "まとめ", bullets: ["貢献できる"] }
  ];
}
