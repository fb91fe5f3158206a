import React, {
  createContext,
  useCallback,
  useContext,
  useEffect,
  useMemo,
  useRef,
  useState,
} from "react";
import type { DatasetSummary, FilterOptions, FilterSelection, MonthlyCount, Preferences } from "@/types/kev";
import type { DataState } from "@/types/context";
import {
  type KevRepository,
  MemoryRepository,
  RemoteRepository,
  createLatestGate,
  errorMessage,
  openRepository,
  querySeries,
} from "@/data/repository";
import { fetchKevCsv, isCsvSource, readKevFile } from "@/services/dataService";
import { cloneSelection, emptySelection, selectionFromParams } from "@/utils/filters";

const defaultPrefs: Preferences = {
  darkMode: true,
};

const PREFS_KEY = "kev:prefs";

const Ctx = createContext<DataState | null>(null);

export function DataProvider({ children }: { children: React.ReactNode }) {
  const [repo, setRepo] = useState<KevRepository | null>(null);
  const [source, setSource] = useState<string | null>(null);
  const [summary, setSummary] = useState<DatasetSummary | null>(null);
  const [options, setOptions] = useState<FilterOptions | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  // Seeded from the page URL so shared links reopen the same view
  const [selection, setSelectionState] = useState<FilterSelection>(() =>
    selectionFromParams(new URLSearchParams(window.location.search))
  );
  const [series, setSeries] = useState<MonthlyCount[]>([]);
  const [total, setTotal] = useState(0);
  const [preferences, setPreferencesState] = useState<Preferences>(() => {
    const raw = localStorage.getItem(PREFS_KEY);
    if (!raw) return defaultPrefs;
    try {
      return { ...defaultPrefs, ...JSON.parse(raw) };
    } catch {
      return defaultPrefs;
    }
  });
  // Newer selections abort the request of older ones
  const inFlightRef = useRef<AbortController | null>(null);
  // Likewise for loads: a file picked during the startup load wins over it
  const loadGateRef = useRef(createLatestGate());

  useEffect(() => {
    document.documentElement.dataset.theme = preferences.darkMode ? "dark" : "light";
  }, [preferences]);

  const setSelection = useCallback((updater: (s: FilterSelection) => FilterSelection) => {
    setSelectionState((prev) => updater(cloneSelection(prev)));
  }, []);

  const resetSelection = useCallback(() => setSelectionState(emptySelection()), []);

  const setPreferences = useCallback(
    (updater: (p: Preferences) => Preferences) => {
      setPreferencesState((prev) => {
        const next = updater(prev);
        localStorage.setItem(PREFS_KEY, JSON.stringify(next));
        return next;
      });
    },
    []
  );

  const runLoad = useCallback(
    async (label: string, build: (signal: AbortSignal) => Promise<KevRepository>) => {
      const signal = loadGateRef.current.start();
      setLoading(true);
      setError(null);
      try {
        const opened = await openRepository(build, signal);
        if (!opened) return;
        setSummary(opened.summary);
        setOptions(opened.options);
        setSource(label);
        setRepo(opened.repo);
      } catch (e) {
        console.error(`[data] Failed to load ${label}:`, e);
        setError(errorMessage(e));
      } finally {
        // a superseded load leaves the flag to the load that replaced it
        if (!signal.aborted) setLoading(false);
      }
    },
    []
  );

  const loadFromUrl = useCallback(
    (url: string) =>
      runLoad(url, async (signal) =>
        isCsvSource(url)
          ? new MemoryRepository(await fetchKevCsv(url, signal))
          : new RemoteRepository(url.replace(/\/?(series|options|summary)\/?$/, ""))
      ),
    [runLoad]
  );

  const loadFromFile = useCallback(
    (file: File) => runLoad(file.name, async () => new MemoryRepository(await readKevFile(file))),
    [runLoad]
  );

  useEffect(() => {
    if (!repo) return;
    inFlightRef.current?.abort();
    const ctrl = new AbortController();
    inFlightRef.current = ctrl;
    void querySeries(repo, selection, ctrl.signal).then((outcome) => {
      switch (outcome.kind) {
        case "ok":
          setSeries(outcome.result.series);
          setTotal(outcome.result.total);
          setError(null);
          return;
        case "error":
          console.error("[data] Series query failed:", outcome.message);
          setError(outcome.message);
          return;
        case "aborted":
          return;
      }
    });
    return () => ctrl.abort();
  }, [repo, selection]);

  const value: DataState = useMemo(
    () => ({
      repo,
      source,
      summary,
      options,
      loading,
      error,
      selection,
      series,
      total,
      preferences,
      loadFromUrl,
      loadFromFile,
      setSelection,
      resetSelection,
      setPreferences,
    }),
    [
      repo,
      source,
      summary,
      options,
      loading,
      error,
      selection,
      series,
      total,
      preferences,
      loadFromUrl,
      loadFromFile,
      setSelection,
      resetSelection,
      setPreferences,
    ]
  );

  return <Ctx.Provider value={value}>{children}</Ctx.Provider>;
}

export function useData() {
  const ctx = useContext(Ctx);
  if (!ctx) throw new Error("useData must be used within DataProvider");
  return ctx;
}
