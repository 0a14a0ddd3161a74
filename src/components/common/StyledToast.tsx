import { toast } from 'sonner';

import type { ReactNode } from 'react';

// ============================================================================
// Shared Toast Components
// ============================================================================

type ToastVariant = 'error' | 'warning';

const VARIANT_STYLES: Record<
    ToastVariant,
    {
        border: string;
        bg: string;
        title: string;
        text: string;
    }
> = {
    error: {
        border: 'border-rose-500/50',
        bg: 'bg-rose-950',
        title: 'text-rose-100',
        text: 'text-rose-200/80',
    },
    warning: {
        border: 'border-amber-500/50',
        bg: 'bg-amber-950',
        title: 'text-amber-100',
        text: 'text-amber-200/80',
    },
};

function DismissButton({ onClick }: { onClick: () => void }) {
    return (
        <button
            onClick={onClick}
            className="flex-none rounded p-1 text-gray-400 hover:bg-gray-800 hover:text-white"
            aria-label="Dismiss"
        >
            <svg
                xmlns="http://www.w3.org/2000/svg"
                viewBox="0 0 20 20"
                fill="currentColor"
                className="size-4"
            >
                <path d="M6.28 5.22a.75.75 0 00-1.06 1.06L8.94 10l-3.72 3.72a.75.75 0 101.06 1.06L10 11.06l3.72 3.72a.75.75 0 101.06-1.06L11.06 10l3.72-3.72a.75.75 0 00-1.06-1.06L10 8.94 6.28 5.22z" />
            </svg>
        </button>
    );
}

interface StyledToastShellProps {
    variant: ToastVariant;
    children: ReactNode;
    onDismiss: () => void;
}

function StyledToastShell({ variant, children, onDismiss }: StyledToastShellProps) {
    const styles = VARIANT_STYLES[variant];
    return (
        <div className={`w-[356px] rounded-lg border ${styles.border} ${styles.bg} p-4 shadow-lg`}>
            <div className="flex items-start gap-3">
                <div className="min-w-0 flex-1">{children}</div>
                <DismissButton onClick={onDismiss} />
            </div>
        </div>
    );
}

interface SimpleToastContentProps {
    variant: ToastVariant;
    title: string;
    message: string;
}

function SimpleToastContent({ variant, title, message }: SimpleToastContentProps) {
    const styles = VARIANT_STYLES[variant];
    return (
        <div className="text-sm select-text">
            <div className={`font-medium ${styles.title}`}>{title}</div>
            <p className={`mt-1 text-xs ${styles.text}`}>{message}</p>
        </div>
    );
}

const showSimpleToast = (
    variant: ToastVariant,
    title: string,
    message: string,
    id?: string,
): void => {
    toast.custom(
        (toastId) => (
            <StyledToastShell variant={variant} onDismiss={() => toast.dismiss(toastId)}>
                <SimpleToastContent variant={variant} title={title} message={message} />
            </StyledToastShell>
        ),
        {
            id,
            duration: Infinity,
            unstyled: true,
        },
    );
};

// ============================================================================
// Camera / detector toasts
// ============================================================================

const SOURCE_UNAVAILABLE_TOAST_ID = 'source-unavailable';

/**
 * Camera could not be opened. Reuses one toast id so repeated failures
 * replace the message instead of stacking.
 */
export function showSourceUnavailableToast(message: string): void {
    showSimpleToast('error', 'Camera unavailable', message, SOURCE_UNAVAILABLE_TOAST_ID);
}

export function showDetectorWarningToast(message: string): void {
    showSimpleToast('warning', 'Face detector', message, 'face-detector');
}
