import type { ReactNode } from 'react';

/* ── IOSSettingsGroup ── */
export function IOSSettingsGroup({ label, footer, children }: { label?: string; footer?: string; children: ReactNode }) {
  return (
    <div className="mb-6">
      {label && <p className="mb-1.5 px-5 text-[13px] uppercase tracking-wide text-[#8e8e93]">{label}</p>}
      <div className="overflow-hidden rounded-[14px] bg-[#1c1c1e]">{children}</div>
      {footer && <p className="mt-1.5 px-5 text-[13px] text-[#8e8e93]">{footer}</p>}
    </div>
  );
}

function RowDivider() {
  return <span className="absolute bottom-0 right-0 h-px bg-[#38383a]" style={{ left: '16px' }} />;
}

/* ── IOSToggleRow ── */
export function IOSToggleRow({
  label,
  checked,
  onChange,
  last = false,
}: {
  label: string;
  checked: boolean;
  onChange: (checked: boolean) => void;
  last?: boolean;
}) {
  return (
    <label className="relative flex w-full items-center justify-between gap-3 px-4 py-[11px]">
      <span className="truncate text-[16px] text-white">{label}</span>
      <input
        type="checkbox"
        role="switch"
        checked={checked}
        onChange={(event) => onChange(event.target.checked)}
        className="h-[31px] w-[51px] shrink-0 cursor-pointer appearance-none rounded-full bg-[#39393d] transition checked:bg-[#34c759]"
      />
      {!last && <RowDivider />}
    </label>
  );
}

/* ── IOSSegmentRow ── */
export function IOSSegmentRow<T extends string | number>({
  label,
  options,
  value,
  onChange,
  last = false,
}: {
  label: string;
  options: ReadonlyArray<{ value: T; label: string }>;
  value: T;
  onChange: (value: T) => void;
  last?: boolean;
}) {
  return (
    <div className="relative flex w-full items-center justify-between gap-3 px-4 py-[9px]">
      <span className="truncate text-[16px] text-white">{label}</span>
      <div className="flex shrink-0 rounded-lg bg-[#2c2c2e] p-0.5" role="radiogroup" aria-label={label}>
        {options.map((option) => (
          <button
            key={String(option.value)}
            type="button"
            role="radio"
            aria-checked={option.value === value}
            onClick={() => onChange(option.value)}
            className={`rounded-md px-2.5 py-1 text-[13px] ${
              option.value === value ? 'bg-[#636366] text-white' : 'text-[#8e8e93]'
            }`}
          >
            {option.label}
          </button>
        ))}
      </div>
      {!last && <RowDivider />}
    </div>
  );
}

/* ── IOSSubPageHeader ── */
export function IOSSubPageHeader({ title }: { title: string }) {
  return (
    <div className="sticky top-0 z-10 bg-black/80 px-4 pb-3 pt-12 backdrop-blur-md">
      <h1 className="text-[34px] font-bold text-white">{title}</h1>
    </div>
  );
}
