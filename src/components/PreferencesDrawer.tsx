import React, { useState } from 'react';
import { useData } from '@/context/DataContext';
import { Button } from '@/components/ui/Button';

export default function PreferencesDrawer() {
  const { preferences, setPreferences } = useData();
  const [open, setOpen] = useState(false);

  return (
    <div className="panel">
      <div className="controls">
        <Button variant="ghost" size="sm" onClick={() => setOpen((v) => !v)}>{open ? 'Hide' : 'Show'} Preferences</Button>
      </div>
      {open && (
        <div className="row" style={{ gap: '1rem' }}>
          <label className="controls" style={{ gap: '.5rem' }}>
            <input type="checkbox" checked={preferences.darkMode} onChange={(e) => setPreferences((p) => ({ ...p, darkMode: e.target.checked }))} />
            <span>Dark mode</span>
          </label>
        </div>
      )}
    </div>
  );
}
