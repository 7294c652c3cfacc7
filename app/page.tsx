import { SlideBuilder } from "@/app/components/slide-builder";

export default function HomePage() {
  return (
    <main className="page-shell space-y-6">
      <header className="panel">
        <h1 className="text-2xl font-semibold text-slate-900">ES Slide Builder</h1>
        <p className="mt-1 text-sm text-slate-600">
          ESを入力 → AIが構成案を作成 → チャットで編集 → PPTXでダウンロード
        </p>
      </header>

      <SlideBuilder />
    </main>
  );
}
