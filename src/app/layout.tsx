import type { Metadata, Viewport } from 'next';
import './globals.css';

export const metadata: Metadata = {
  title: '貓咪熱量計算機',
  description: '計算貓咪每日所需熱量、分析目前飲食並產生乾濕食餵食建議與報告圖檔。',
};

export const viewport: Viewport = {
  width: 'device-width',
  initialScale: 1,
  themeColor: '#FFFFF8',
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="zh-Hant-TW">
      <body className="bg-bg-primary text-text-primary antialiased min-h-screen">{children}</body>
    </html>
  );
}
