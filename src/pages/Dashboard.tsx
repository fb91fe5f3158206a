import React, { useEffect, useRef, useState } from "react";
import { useData } from "@/context/DataContext";
import FilterChips from "@/components/FilterChips";
import ExportButton from "@/components/ExportButton";
import PreferencesDrawer from "@/components/PreferencesDrawer";
import TrendChart from "@/charts/TrendChart";
import { Button } from "@/components/ui/Button";
import { getDefaultApiBase, getDefaultCsvUrl } from "@/services/dataService";

export default function Dashboard() {
  const { summary, source, loadFromUrl, loadFromFile, loading } = useData();
  const [url, setUrl] = useState<string>(() => getDefaultApiBase());
  const autoLoaded = useRef(false);

  useEffect(() => {
    if (autoLoaded.current) return;
    autoLoaded.current = true;
    // Prefer the API when it answers, otherwise parse the bundled CSV in the page
    const checkAndLoad = async () => {
      const base = getDefaultApiBase();
      let apiUp = false;
      try {
        const resp = await fetch(`${base.replace(/\/$/, "")}/summary`, { method: "GET" });
        apiUp = resp.ok;
      } catch (e) {
        console.info("[data] API probe failed, falling back to CSV:", e);
      }
      const target = apiUp ? base : getDefaultCsvUrl();
      setUrl(target);
      await loadFromUrl(target);
    };
    void checkAndLoad();
  }, [loadFromUrl]);

  const onFile = (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (file) void loadFromFile(file);
  };

  return (
    <div className="col">
      <div className="panel">
        <div className="controls" style={{ gap: ".6rem", flexWrap: "wrap" }}>
          <input
            className="grow"
            value={url}
            onChange={(e) => setUrl(e.target.value)}
            placeholder="/api/v1 or https://…/known_exploited_vulnerabilities.csv"
          />
          <Button variant="primary" onClick={() => void loadFromUrl(url)} disabled={loading}>
            Load
          </Button>
          <label className="btn btn-default">
            Open CSV…
            <input type="file" accept=".csv,text/csv" onChange={onFile} hidden />
          </label>
          <ExportButton />
        </div>
        <div className="tiny" style={{ marginTop: ".5rem" }}>
          Tip: point to an API base (e.g. /api/v1) or to a KEV CSV export. Configure
          defaults via VITE_API_URL and VITE_KEV_CSV_URL.
        </div>
        {(loading || source) && (
          <div className="tiny" style={{ marginTop: ".25rem" }}>
            {loading ? "Loading…" : `Source: ${source}`}
            {summary && !loading && ` • ${summary.total.toLocaleString()} records`}
          </div>
        )}
      </div>

      <FilterChips />
      {summary && <TrendChart />}
      <PreferencesDrawer />

      <footer className="tiny footer">Data: CISA KEV</footer>
    </div>
  );
}
