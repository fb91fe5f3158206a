import React from 'react';
import { useData } from '@/context/DataContext';
import { selectionToParams } from '@/utils/filters';
import { Button } from '@/components/ui/Button';

export default function ExportButton() {
  const { series, selection, source } = useData();
  const exportJson = () => {
    const payload = {
      exportedAt: new Date().toISOString(),
      source,
      selection: {
        years: Array.from(selection.years),
        vendors: Array.from(selection.vendors),
        cwes: Array.from(selection.cwes),
        ransomware: selection.ransomware,
      },
      query: selectionToParams(selection).toString(),
      series,
    };
    const blob = new Blob([JSON.stringify(payload, null, 2)], { type: 'application/json' });
    const url = URL.createObjectURL(blob);
    const a = document.createElement('a');
    a.href = url;
    a.download = 'kev-monthly-counts.json';
    a.click();
    URL.revokeObjectURL(url);
  };
  return <Button variant="ghost" onClick={exportJson} disabled={!series.length}>Export (.json)</Button>;
}
