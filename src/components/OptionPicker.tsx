import React, { useMemo, useState } from 'react';
import { Button } from '@/components/ui/Button';

interface OptionPickerProps {
  label: string;
  options: string[];
  selected: Set<string>;
  onToggle: (value: string) => void;
  placeholder?: string;
  limit?: number;
}

// Searchable chip list for long option sets (vendors, CWEs)
export default function OptionPicker({ label, options, selected, onToggle, placeholder, limit = 24 }: OptionPickerProps) {
  const [query, setQuery] = useState('');
  const matches = useMemo(() => {
    const q = query.trim().toLowerCase();
    const pool = q ? options.filter((o) => o.toLowerCase().includes(q)) : options;
    return pool.filter((o) => !selected.has(o)).slice(0, limit);
  }, [options, selected, query, limit]);

  return (
    <div className="controls" style={{ marginTop: '.5rem' }}>
      <span className="hint">{label}:</span>
      {Array.from(selected).map((v) => (
        <Button key={v} variant="primary" size="sm" onClick={() => onToggle(v)} title="Remove">
          {v} ×
        </Button>
      ))}
      <input value={query} onChange={(e) => setQuery(e.target.value)} placeholder={placeholder ?? `Search ${label.toLowerCase()}…`} />
      {matches.map((v) => (
        <Button key={v} size="sm" onClick={() => onToggle(v)}>
          {v}
        </Button>
      ))}
    </div>
  );
}
