'use client';

import { useId } from 'react';

interface NumberFieldProps {
  label: string;
  value: string;
  onChange: (value: string) => void;
  min?: number;
  max?: number;
  step?: number;
}

/**
 * Labelled numeric input. Keeps the raw string so the field can be cleared
 * while typing; callers parse on submit.
 */
export function NumberField({ label, value, onChange, min, max, step }: NumberFieldProps) {
  const id = useId();

  return (
    <label htmlFor={id} className="flex flex-col gap-1">
      <span className="field-label">{label}</span>
      <input
        id={id}
        type="number"
        inputMode="decimal"
        className="field-input"
        value={value}
        min={min}
        max={max}
        step={step}
        onChange={(event) => onChange(event.target.value)}
      />
    </label>
  );
}
