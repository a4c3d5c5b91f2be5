'use client';

import { useEffect } from 'react';
import { logError } from '@/lib/logger';

export default function Error({
  error,
  reset,
}: {
  error: Error & { digest?: string };
  reset: () => void;
}) {
  useEffect(() => {
    logError('[app/error] Unhandled render error', error);
  }, [error]);

  return (
    <div className="min-h-screen bg-bg-primary flex items-center justify-center p-6">
      <div className="card max-w-md w-full text-center">
        <div className="text-5xl mb-4">🙀</div>
        <h1 className="text-page-title mb-2">發生錯誤</h1>
        <p className="text-body text-text-secondary mb-2">計算機發生未預期的錯誤。</p>
        {error.digest && (
          <p className="text-caption text-text-muted mb-4">
            錯誤代碼: {error.digest}
          </p>
        )}
        <button onClick={reset} className="btn-primary w-full mt-6">
          重新載入
        </button>
      </div>
    </div>
  );
}
