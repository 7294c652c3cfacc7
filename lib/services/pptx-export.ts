import PptxGenJS from "pptxgenjs";
import { safeLine } from "@/lib/utils/sanitize";
import type { Slide } from "@/lib/validators/output-schema";

export const MASTER_NAME = "TITLE_AND_BODY";

const COLOR = {
  accent: "0B7285",
  slate900: "0F172A",
  slate700: "334155",
  white: "FFFFFF"
} as const;

const FONT_FACE = "Meiryo";

function defineTitleAndBodyMaster(pptx: PptxGenJS): void {
  pptx.defineSlideMaster({
    title: MASTER_NAME,
    background: { color: COLOR.white },
    objects: [
      { rect: { x: 0, y: 0, w: 10, h: 0.12, fill: { color: COLOR.accent } } },
      {
        placeholder: {
          options: {
            name: "title",
            type: "title",
            x: 0.5,
            y: 0.35,
            w: 9,
            h: 1.1,
            fontFace: FONT_FACE,
            fontSize: 28,
            color: COLOR.slate900,
            valign: "middle"
          },
          text: ""
        }
      },
      {
        placeholder: {
          options: {
            name: "body",
            type: "body",
            x: 0.5,
            y: 1.6,
            w: 9,
            h: 5.5,
            fontFace: FONT_FACE,
            fontSize: 18,
            color: COLOR.slate700,
            valign: "top"
          },
          text: ""
        }
      }
    ]
  });
}

/** bullet[0] is the message line and always renders as a bold first paragraph. */
export function toBodyRuns(bullets: string[]): PptxGenJS.TextProps[] {
  return bullets.map((bullet, index) => ({
    text: safeLine(bullet),
    options: index === 0 ? { bold: true, breakLine: true } : { breakLine: true }
  }));
}

async function toNodeBuffer(pptx: PptxGenJS): Promise<Buffer> {
  const content = await pptx.write({ outputType: "nodebuffer" });

  if (typeof content === "string") {
    return Buffer.from(content, "binary");
  }

  if (content instanceof ArrayBuffer) {
    return Buffer.from(content);
  }

  // Node returns a Buffer, which is a Uint8Array.
  if (content instanceof Uint8Array) {
    return Buffer.from(content.buffer, content.byteOffset, content.byteLength);
  }

  return Buffer.from(await content.arrayBuffer());
}

export async function toPptxBuffer(slides: Slide[]): Promise<Buffer> {
  const pptx = new PptxGenJS();
  pptx.layout = "LAYOUT_4x3";
  pptx.author = "ES Slide Builder";
  pptx.company = "es-slide-builder";
  pptx.subject = "ESから生成したプレゼンテーション";
  pptx.title = safeLine(slides[0]?.title ?? "") || "ES Slides";

  defineTitleAndBodyMaster(pptx);

  for (const data of slides) {
    const slide = pptx.addSlide({ masterName: MASTER_NAME });
    slide.addText(safeLine(data.title), { placeholder: "title" });

    // A slide without bullets keeps its title and gets no body text.
    if (data.bullets.length > 0) {
      slide.addText(toBodyRuns(data.bullets), { placeholder: "body" });
    }
  }

  return toNodeBuffer(pptx);
}
