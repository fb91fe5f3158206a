import React from 'react';
import { Outlet, Link } from 'react-router-dom';
import { useData } from '@/context/DataContext';

export default function App() {
  const { summary, loading, error } = useData();
  return (
    <div className="app-shell">
      <header className="app-header">
        <Link to="/" className="brand">Known Exploited Vulnerabilities Dashboard</Link>
        <div className="spacer" />
        {summary && (
          <div className="header-stats">
            <span>Total: {summary.total.toLocaleString()}</span>
            <span>Ransomware: {summary.knownRansomware.toLocaleString()}</span>
            {summary.firstMonth && summary.lastMonth && (
              <span>
                {summary.firstMonth} – {summary.lastMonth}
              </span>
            )}
          </div>
        )}
      </header>
      {loading && !summary && <div className="banner loading">Loading data…</div>}
      {error && <div className="banner error">{error}</div>}
      <main className="app-main">
        <Outlet />
      </main>
    </div>
  );
}
