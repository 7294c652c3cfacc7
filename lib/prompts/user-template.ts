import type { Section } from "@/lib/validators/input";
import type { MessageLineSlide } from "@/lib/validators/output-schema";

export const MESSAGE_LINE_TARGET_CHARS = 80;

export function formatSections(sections: Section[]): string {
  return sections.map((section) => `【${section.title}】\n${section.content}`).join("\n\n");
}

export function buildMessageLinePrompt(sections: Section[]): string {
  return `以下のES情報から、ストーリー性のあるプレゼンテーションの構成案を作成してください。

# 入力情報
${formatSections(sections)}

# 各スライドの要件
- title: スライドのタイトル
- message_line: このスライドで伝える核心メッセージを1行で（${MESSAGE_LINE_TARGET_CHARS}文字以内）
  - 事実と示唆を統合した1文にする（「〇〇なので△△が必要」「〇〇を経験したので△△で貢献できる」など）
  - 「事実:」「示唆:」などのプレフィックスは付けない

# 全体の要件
1. 最初のスライドはタイトルスライドにし、メッセージラインで全体の目的を示す
2. 最後のスライドはまとめスライドにし、メッセージラインで結論と次のアクションを示す
3. 全体で5〜8枚程度にする
4. 情報を適切にグループ化し、流れのあるストーリーにする

# 出力形式
次のJSONオブジェクトのみを返してください（説明文は不要）:
{
  "slides": [
    { "title": "スライドのタイトル", "message_line": "核心メッセージ" }
  ]
}`;
}

export function buildSlideBodyPrompt(params: {
  slide: MessageLineSlide;
  index: number;
  total: number;
  sections: Section[];
}): string {
  const position =
    params.index === 0
      ? "タイトルスライド（全体の目的を示す）"
      : params.index === params.total - 1
        ? "まとめスライド（結論と次のアクション）"
        : `本編スライド（${params.index + 1}/${params.total}枚目）`;

  return `次のスライドのメッセージラインを裏付けるボディ（箇条書き）を作成し、record_slide_body を呼び出して返してください。

# 対象スライド
- 位置: ${position}
- タイトル: ${params.slide.title}
- メッセージライン: ${params.slide.message_line}

# 元のES情報（根拠はここから取る）
${formatSections(params.sections)}

# ボディの要件
- 箇条書きは3〜5個
- 元のES情報の記述をできるだけそのまま引用・要約して使い、書かれていない内容を創作しない
- 次の順序で並べる:
  1. メッセージラインの根拠となる背景・理由
  2. 具体的な事例やデータ
  3. 詳細な説明や補足
  4. （任意）行動項目や今後の検討ポイント
- メッセージラインそのものは繰り返さない`;
}
