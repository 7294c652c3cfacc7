import type { Metadata } from "next";
import "@/app/globals.css";

export const metadata: Metadata = {
  title: "ES Slide Builder",
  description: "ESからスライド構成案を生成し、チャットで編集してPPTXに書き出します"
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="ja">
      <body>{children}</body>
    </html>
  );
}
