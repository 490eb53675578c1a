import type { ReactNode } from "react";

type SectionProps = {
  title: ReactNode;
  id?: string;
  subtitle?: ReactNode;
  actions?: ReactNode;
  children: ReactNode;
  className?: string;
};

export function Section({ title, id, subtitle, actions, children, className = "" }: SectionProps) {
  return (
    <section
      id={id}
      className={`scroll-mt-24 rounded-2xl shadow-sm p-3 md:p-4 border border-slate-200 bg-white print-avoid ${className}`}
    >
      <div className="mb-3 flex flex-wrap items-start gap-3 md:items-center md:justify-between">
        <div className="min-w-0">
          <h2 className="font-semibold text-lg">{title}</h2>
          {subtitle ? <p className="text-xs text-slate-500 mt-0.5">{subtitle}</p> : null}
        </div>
        {actions ? <div className="no-print flex flex-wrap justify-end gap-2">{actions}</div> : null}
      </div>
      <div className="space-y-3">{children}</div>
    </section>
  );
}
