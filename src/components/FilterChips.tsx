import React, { useEffect } from 'react';
import { useSearchParams } from 'react-router-dom';
import { useData } from '@/context/DataContext';
import { isEmptySelection, selectionToParams, toggleSet } from '@/utils/filters';
import { Button } from '@/components/ui/Button';
import OptionPicker from '@/components/OptionPicker';

export default function FilterChips() {
  const { options, selection, setSelection, resetSelection } = useData();
  useSelectionInUrl();
  if (!options) return null;

  const toggleYear = (y: number) => setSelection((s) => ({ ...s, years: toggleSet(s.years, y) }));

  return (
    <div className="panel">
      <div className="controls">
        <span className="hint">Years:</span>
        {options.years.map((y) => (
          <Button key={y} size="sm" variant={selection.years.has(y) ? 'primary' : 'default'} onClick={() => toggleYear(y)}>
            {y}
          </Button>
        ))}
      </div>
      <OptionPicker
        label="Vendors"
        options={options.vendors}
        selected={selection.vendors}
        onToggle={(v) => setSelection((s) => ({ ...s, vendors: toggleSet(s.vendors, v) }))}
      />
      <OptionPicker
        label="CWEs"
        options={options.cwes}
        selected={selection.cwes}
        onToggle={(c) => setSelection((s) => ({ ...s, cwes: toggleSet(s.cwes, c) }))}
        placeholder="CWE-79…"
      />
      <div className="controls" style={{ marginTop: '.5rem' }}>
        <span className="hint">Ransomware use:</span>
        {options.ransomware.map((m) => (
          <Button key={m} size="sm" variant={selection.ransomware === m ? 'primary' : 'default'} onClick={() => setSelection((s) => ({ ...s, ransomware: m }))}>
            {m}
          </Button>
        ))}
        <div className="spacer" />
        {!isEmptySelection(selection) && <Button variant="ghost" size="sm" onClick={resetSelection}>Reset</Button>}
      </div>
    </div>
  );
}

// Mirrors the selection into the query string so the view can be shared
function useSelectionInUrl() {
  const { selection } = useData();
  const [params, setParams] = useSearchParams();
  useEffect(() => {
    const next = selectionToParams(selection);
    if (next.toString() !== params.toString()) setParams(next, { replace: true });
  }, [selection, params, setParams]);
}
