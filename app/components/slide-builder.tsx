"use client";

import { FormEvent, useMemo, useState } from "react";
import { z } from "zod";
import { Slide, SlidesStateSchema } from "@/lib/validators/output-schema";

interface SectionDraft {
  title: string;
  content: string;
}

interface ChatEntry {
  prompt: string;
  command: string;
  applied: boolean;
}

const DEFAULT_SECTIONS: SectionDraft[] = [
  { title: "自己PR", content: "" },
  { title: "学生時代に力を入れたこと", content: "" }
];

const ErrorPayloadSchema = z.object({
  error: z.string().optional(),
  details: z.array(z.string()).optional()
});

const PatchPayloadSchema = SlidesStateSchema.extend({
  command: z.string(),
  applied: z.boolean()
});

const ExportPayloadSchema = z.object({
  download_url: z.string(),
  filename: z.string()
});

const COMMAND_LABELS: Record<string, string> = {
  delete: "最後のスライドを削除",
  append: "スライドを追加",
  retitle: "タイトルを変更",
  addBullet: "箇条書きを追加",
  annotate: "メモを追記",
  noop: "変更なし"
};

async function readError(response: Response, fallback: string): Promise<string> {
  const parsed = ErrorPayloadSchema.safeParse(await response.json().catch(() => null));
  if (!parsed.success) return fallback;
  const detail = parsed.data.details?.length ? ` ${parsed.data.details.join(" | ")}` : "";
  return `${parsed.data.error ?? fallback}${detail}`;
}

async function postJson(url: string, payload: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(payload)
  });
}

function SlideCard({ slide, index }: { slide: Slide; index: number }) {
  const [messageLine, ...body] = slide.bullets;

  return (
    <article className="panel">
      <p className="text-xs font-medium text-slate-500">スライド {index + 1}</p>
      <h3 className="mt-1 text-lg font-semibold text-slate-900">{slide.title}</h3>
      {messageLine !== undefined ? <p className="mt-3 font-bold text-slate-900">{messageLine}</p> : null}
      {body.length ? (
        <ul className="mt-2 list-disc space-y-1 pl-5 text-sm text-slate-700">
          {body.map((bullet, bulletIndex) => (
            <li key={bulletIndex}>{bullet}</li>
          ))}
        </ul>
      ) : null}
    </article>
  );
}

export function SlideBuilder() {
  const [sections, setSections] = useState<SectionDraft[]>(DEFAULT_SECTIONS);
  const [slides, setSlides] = useState<Slide[]>([]);
  const [prompt, setPrompt] = useState("");
  const [chat, setChat] = useState<ChatEntry[]>([]);
  const [download, setDownload] = useState<{ url: string; filename: string } | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [busy, setBusy] = useState<"generate" | "patch" | "export" | null>(null);

  const canGenerate = useMemo(
    () => busy === null && sections.some((section) => section.title.trim() && section.content.trim()),
    [busy, sections]
  );

  function updateSection(index: number, patch: Partial<SectionDraft>) {
    setSections((prev) => prev.map((section, i) => (i === index ? { ...section, ...patch } : section)));
  }

  async function onGenerate(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    setError(null);
    setDownload(null);
    setBusy("generate");

    try {
      const filled = sections.filter((section) => section.title.trim() && section.content.trim());
      const response = await postJson("/generate", { sections: filled });
      if (!response.ok) {
        setError(await readError(response, "スライドの生成に失敗しました。"));
        return;
      }

      const parsed = SlidesStateSchema.safeParse(await response.json());
      if (!parsed.success) {
        setError("サーバーの応答形式が正しくありません。");
        return;
      }
      setSlides(parsed.data.slides);
      setChat([]);
    } catch {
      setError("ネットワークエラーによりスライドを生成できませんでした。");
    } finally {
      setBusy(null);
    }
  }

  async function onPatch(event: FormEvent<HTMLFormElement>) {
    event.preventDefault();
    if (!prompt.trim()) return;
    setError(null);
    setBusy("patch");

    try {
      const response = await postJson("/patch", { slides, prompt });
      if (!response.ok) {
        setError(await readError(response, "スライドを編集できませんでした。"));
        return;
      }

      const parsed = PatchPayloadSchema.safeParse(await response.json());
      if (!parsed.success) {
        setError("サーバーの応答形式が正しくありません。");
        return;
      }
      setSlides(parsed.data.slides);
      setChat((prev) => [...prev, { prompt, command: parsed.data.command, applied: parsed.data.applied }]);
      setPrompt("");
      setDownload(null);
    } catch {
      setError("ネットワークエラーによりスライドを編集できませんでした。");
    } finally {
      setBusy(null);
    }
  }

  async function onExport() {
    setError(null);
    setBusy("export");

    try {
      const response = await postJson("/export", { slides });
      if (!response.ok) {
        setError(await readError(response, "PPTXを書き出せませんでした。"));
        return;
      }

      const parsed = ExportPayloadSchema.safeParse(await response.json());
      if (!parsed.success) {
        setError("サーバーの応答形式が正しくありません。");
        return;
      }
      setDownload({ url: parsed.data.download_url, filename: parsed.data.filename });
    } catch {
      setError("ネットワークエラーによりPPTXを書き出せませんでした。");
    } finally {
      setBusy(null);
    }
  }

  return (
    <div className="space-y-6">
      <form onSubmit={onGenerate} className="panel space-y-4">
        <h2 className="text-lg font-semibold text-slate-900">ESの入力</h2>
        {sections.map((section, index) => (
          <div key={index} className="grid gap-2 rounded-lg border border-slate-200 p-4">
            <div className="flex items-center justify-between gap-3">
              <input
                className="field"
                value={section.title}
                onChange={(event) => updateSection(index, { title: event.target.value })}
                placeholder="見出し（例: 自己PR）"
              />
              <button
                type="button"
                className="btn-secondary"
                disabled={sections.length <= 1}
                onClick={() => setSections((prev) => prev.filter((_, i) => i !== index))}
              >
                削除
              </button>
            </div>
            <textarea
              className="field min-h-[120px]"
              value={section.content}
              onChange={(event) => updateSection(index, { content: event.target.value })}
              placeholder="本文"
            />
          </div>
        ))}
        <div className="flex flex-wrap gap-3">
          <button
            type="button"
            className="btn-secondary"
            onClick={() => setSections((prev) => [...prev, { title: "", content: "" }])}
          >
            セクションを追加
          </button>
          <button type="submit" className="btn-primary" disabled={!canGenerate}>
            {busy === "generate" ? "生成中..." : "構成案を生成"}
          </button>
        </div>
      </form>

      {error ? <div className="rounded-lg bg-red-50 px-4 py-3 text-sm text-danger">{error}</div> : null}

      {slides.length ? (
        <section className="space-y-4">
          <div className="flex flex-wrap items-center justify-between gap-3">
            <h2 className="text-lg font-semibold text-slate-900">スライド構成（{slides.length}枚）</h2>
            <div className="flex items-center gap-3">
              {download ? (
                <a className="text-sm font-medium text-accent underline" href={download.url}>
                  {download.filename} をダウンロード
                </a>
              ) : null}
              <button type="button" className="btn-primary" disabled={busy !== null} onClick={onExport}>
                {busy === "export" ? "書き出し中..." : "PPTXに書き出す"}
              </button>
            </div>
          </div>

          {slides.map((slide, index) => (
            <SlideCard key={index} slide={slide} index={index} />
          ))}

          <form onSubmit={onPatch} className="panel space-y-3">
            <label className="label" htmlFor="patch-prompt">
              チャットで編集（例: 「スライドを追加」「タイトルを変更→新しいタイトル」「箇条書き リーダー経験」）
            </label>
            <div className="flex gap-3">
              <input
                id="patch-prompt"
                className="field"
                value={prompt}
                onChange={(event) => setPrompt(event.target.value)}
              />
              <button type="submit" className="btn-primary" disabled={busy !== null || !prompt.trim()}>
                送信
              </button>
            </div>
            {chat.length ? (
              <ul className="space-y-1 text-sm text-slate-600">
                {chat.map((entry, index) => (
                  <li key={index}>
                    「{entry.prompt}」→ {COMMAND_LABELS[entry.command] ?? entry.command}
                    {entry.applied ? "" : "（変更はありませんでした）"}
                  </li>
                ))}
              </ul>
            ) : null}
          </form>
        </section>
      ) : null}
    </div>
  );
}
