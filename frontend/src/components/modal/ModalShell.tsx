import { useEffect, useRef, type FormEvent, type KeyboardEvent, type ReactNode } from "react";
import { createPortal } from "react-dom";

interface ModalShellProps {
  title: string;
  description?: string;
  children: ReactNode;
  onClose: () => void;
  onSubmit: () => void;
  submitLabel?: string;
  error?: string | null;
}

/**
 * Form dialog rendered into `document.body`. Enter submits, Escape and a
 * click on the backdrop close it, and focus returns to the opener afterwards.
 */
export function ModalShell({ title, description, children, onClose, onSubmit, submitLabel = "Save", error }: ModalShellProps) {
  const formRef = useRef<HTMLFormElement>(null);

  useEffect(() => {
    const opener = document.activeElement;
    formRef.current?.querySelector<HTMLElement>("input, select, textarea")?.focus();
    return () => {
      if (opener instanceof HTMLElement) opener.focus();
    };
  }, []);

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    onSubmit();
  };

  const handleKeyDown = (event: KeyboardEvent<HTMLDivElement>) => {
    if (event.key === "Escape") {
      event.stopPropagation();
      onClose();
    }
  };

  return createPortal(
    <div
      className="fixed inset-0 z-50 grid place-items-center bg-slate-900/50 p-4"
      onMouseDown={(event) => {
        if (event.target === event.currentTarget) onClose();
      }}
      onKeyDown={handleKeyDown}
    >
      <form
        ref={formRef}
        role="dialog"
        aria-modal="true"
        aria-labelledby="modal-shell-title"
        onSubmit={handleSubmit}
        className="flex max-h-[90vh] w-full max-w-lg flex-col rounded-3xl bg-white shadow-xl"
      >
        <div className="px-6 pt-6">
          <h2 id="modal-shell-title" className="text-lg font-semibold text-slate-900">
            {title}
          </h2>
          {description ? <p className="mt-1 text-sm text-slate-500">{description}</p> : null}
        </div>

        <div className="flex-1 overflow-y-auto px-6 py-5">{children}</div>

        {error ? (
          <p role="alert" className="mx-6 mb-4 rounded-xl bg-red-50 px-4 py-2 text-sm text-red-600">
            {error}
          </p>
        ) : null}

        <div className="flex justify-end gap-2 rounded-b-3xl border-t border-slate-200 px-6 py-4">
          <button
            type="button"
            className="rounded-full px-4 py-2 text-sm font-medium text-slate-600 hover:bg-slate-100"
            onClick={onClose}
          >
            Cancel
          </button>
          <button type="submit" className="rounded-full bg-slate-900 px-4 py-2 text-sm font-semibold text-white hover:bg-slate-700">
            {submitLabel}
          </button>
        </div>
      </form>
    </div>,
    document.body,
  );
}
