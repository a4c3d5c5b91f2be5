'use client';

export type NoticeTone = 'error' | 'warning' | 'info' | 'success';

interface NoticeBannerProps {
    /** Short heading, e.g. "攝取超標" */
    title?: string;
    message: string;
    tone?: NoticeTone;
    className?: string;
}

const TONE_CLASSES: Record<NoticeTone, { box: string; title: string; body: string }> = {
    error: { box: 'bg-red-500/10 border-red-500/30', title: 'text-red-600', body: 'text-red-700/80' },
    warning: { box: 'bg-amber-500/10 border-amber-500/30', title: 'text-amber-700', body: 'text-amber-800/80' },
    info: { box: 'bg-sky-500/10 border-sky-500/30', title: 'text-sky-700', body: 'text-sky-800/80' },
    success: { box: 'bg-emerald-500/10 border-emerald-500/30', title: 'text-emerald-700', body: 'text-emerald-800/80' },
};

/**
 * Inline notice used for step errors, preconditions and intake verdicts.
 * Errors and warnings are announced to screen readers.
 *
 * @example
 * <NoticeBanner tone="error" title="計算失敗" message="體重必須大於零。" />
 */
export function NoticeBanner({ title, message, tone = 'info', className = '' }: NoticeBannerProps) {
    const classes = TONE_CLASSES[tone];
    const isUrgent = tone === 'error' || tone === 'warning';

    return (
        <div
            role={isUrgent ? 'alert' : 'status'}
            className={`p-4 rounded-xl border ${classes.box} ${className}`}
        >
            {title && <p className={`font-medium text-sm ${classes.title}`}>{title}</p>}
            <p className={`text-sm ${title ? 'mt-1' : ''} ${classes.body}`}>{message}</p>
        </div>
    );
}
