import React, { useState, useEffect } from 'react';
import {
  Plane,
  CloudRain,
  Clock,
  MapPin,
  BarChart3,
  FileText,
  AlertTriangle,
  CheckCircle2,
  Loader2,
} from 'lucide-react';
import { motion, AnimatePresence } from 'motion/react';
import {
  getDirectory,
  analyzeDataFile,
  getHistogram,
  type AnalysisResponse,
  type DirectoryResponse,
  type HistogramResponse,
} from './api.js';
import { HistogramChart } from './HistogramChart.js';

// --- Components ---

function ErrorBanner({ message }: { message: string }) {
  return (
    <div className="p-4 rounded-xl border border-rose-500/20 bg-rose-500/5 flex items-start space-x-3">
      <AlertTriangle className="w-5 h-5 text-rose-400 mt-0.5 flex-shrink-0" />
      <p className="text-sm text-rose-200">{message}</p>
    </div>
  );
}

function Metric({ icon, label, value }: { icon: React.ReactNode; label: string; value: string | number }) {
  return (
    <div className="p-4 rounded-xl bg-slate-900/50 border border-slate-800/50">
      <div className="flex items-center gap-2 text-xs text-slate-400">
        {icon}
        {label}
      </div>
      <p className="text-2xl font-semibold text-slate-100 mt-1">{value}</p>
    </div>
  );
}

function MetricsPanel({ analysis }: { analysis: AnalysisResponse }) {
  const { result, selection, report } = analysis;

  return (
    <div className="space-y-4">
      <p className="text-slate-300">
        File <span className="font-mono">{selection.fileName}</span> selected — planes departing{' '}
        {selection.airportName} {selection.year}.
      </p>

      <div className="grid grid-cols-2 md:grid-cols-4 gap-3">
        <Metric icon={<Plane className="w-3.5 h-3.5" />} label="Total flights" value={result.totalFlights} />
        <Metric icon={<Plane className="w-3.5 h-3.5" />} label="Runway one" value={result.runway1Flights} />
        <Metric icon={<MapPin className="w-3.5 h-3.5" />} label="Over 500 miles" value={result.longFlights} />
        <Metric icon={<Plane className="w-3.5 h-3.5" />} label="British Airways" value={result.airlineFlights.BA ?? 0} />
        <Metric icon={<CloudRain className="w-3.5 h-3.5" />} label="Departing in rain" value={result.rainFlights} />
        <Metric icon={<CloudRain className="w-3.5 h-3.5" />} label="Hours with rain" value={result.rainHoursCount} />
        <Metric icon={<Clock className="w-3.5 h-3.5" />} label="Flights per hour" value={result.avgFlightsPerHour} />
        <Metric icon={<Clock className="w-3.5 h-3.5" />} label="Delayed" value={`${result.delayedPercentage}%`} />
        <Metric icon={<Plane className="w-3.5 h-3.5" />} label="Air France share" value={`${result.afPercentage}%`} />
      </div>

      <p className="text-sm text-slate-400">
        Most common destinations:{' '}
        {result.commonDestinations.length > 0 ? result.commonDestinations.join(', ') : '—'}
      </p>

      <div className="flex items-center gap-2 text-xs text-slate-500">
        {report.saved
          ? <><CheckCircle2 className="w-3.5 h-3.5 text-emerald-400" /> Results saved to {report.path}</>
          : <><FileText className="w-3.5 h-3.5 text-amber-400" /> {report.error}</>}
      </div>
    </div>
  );
}

export default function App() {
  const [directory, setDirectory] = useState<DirectoryResponse | null>(null);
  const [airport, setAirport] = useState('');
  const [year, setYear] = useState('');
  const [airline, setAirline] = useState('');
  const [analysis, setAnalysis] = useState<AnalysisResponse | null>(null);
  const [histogram, setHistogram] = useState<HistogramResponse | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);

  useEffect(() => {
    let cancelled = false;
    void getDirectory().then(res => {
      if (cancelled) return;
      if (res.ok) setDirectory(res.data);
      else setError(res.error);
    });
    return () => { cancelled = true; };
  }, []);

  async function handleAnalyze(e: React.FormEvent) {
    e.preventDefault();
    setLoading(true);
    setError(null);
    setHistogram(null);

    const res = await analyzeDataFile(airport, year);
    setLoading(false);
    if (res.ok) {
      setAnalysis(res.data);
    } else {
      setAnalysis(null);
      setError(res.error);
    }
  }

  async function handleHistogram(e: React.FormEvent) {
    e.preventDefault();
    if (!analysis) return;
    setError(null);

    const { selection } = analysis;
    const res = await getHistogram(selection.airportCode, String(selection.year), airline);
    if (res.ok) {
      setHistogram(res.data);
    } else {
      setHistogram(null);
      setError(res.error);
    }
  }

  return (
    <div className="min-h-screen bg-slate-950 text-slate-100">
      <header className="border-b border-slate-800 px-6 py-4 flex items-center gap-3">
        <BarChart3 className="w-6 h-6 text-sky-400" />
        <h1 className="text-lg font-semibold">Departure Stats</h1>
      </header>

      <main className="max-w-5xl mx-auto p-6 space-y-6">
        <form onSubmit={handleAnalyze} className="flex flex-wrap items-end gap-3">
          <label className="flex flex-col text-xs text-slate-400">
            Departure airport
            <select
              value={airport}
              onChange={e => setAirport(e.target.value)}
              className="mt-1 bg-slate-900 border border-slate-700 rounded-lg px-3 py-2 text-sm text-slate-100"
            >
              <option value="">Select…</option>
              {directory?.airports.map(a => (
                <option key={a.code} value={a.code}>{a.code} — {a.name}</option>
              ))}
            </select>
          </label>
          <label className="flex flex-col text-xs text-slate-400">
            Year
            <input
              value={year}
              onChange={e => setYear(e.target.value)}
              placeholder={directory ? `${directory.years.min}–${directory.years.max}` : 'YYYY'}
              className="mt-1 w-28 bg-slate-900 border border-slate-700 rounded-lg px-3 py-2 text-sm text-slate-100"
            />
          </label>
          <button
            type="submit"
            disabled={loading}
            className="inline-flex items-center gap-2 bg-sky-600 hover:bg-sky-500 rounded-lg px-4 py-2 text-sm font-medium disabled:opacity-50"
          >
            {loading ? <Loader2 className="w-4 h-4 animate-spin" /> : <FileText className="w-4 h-4" />}
            Analyse
          </button>
        </form>

        {error && <ErrorBanner message={error} />}

        <AnimatePresence>
          {analysis && (
            <motion.div
              key={analysis.selection.fileName}
              initial={{ opacity: 0, y: 8 }}
              animate={{ opacity: 1, y: 0 }}
              exit={{ opacity: 0 }}
              className="space-y-6"
            >
              <MetricsPanel analysis={analysis} />

              <form onSubmit={handleHistogram} className="flex items-end gap-3">
                <label className="flex flex-col text-xs text-slate-400">
                  Airline code
                  <input
                    value={airline}
                    onChange={e => setAirline(e.target.value)}
                    maxLength={2}
                    placeholder="BA"
                    list="airline-codes"
                    className="mt-1 w-20 bg-slate-900 border border-slate-700 rounded-lg px-3 py-2 text-sm uppercase text-slate-100"
                  />
                  <datalist id="airline-codes">
                    {directory?.airlines.map(a => (
                      <option key={a.code} value={a.code}>{a.name}</option>
                    ))}
                  </datalist>
                </label>
                <button
                  type="submit"
                  className="inline-flex items-center gap-2 bg-slate-800 hover:bg-slate-700 rounded-lg px-4 py-2 text-sm"
                >
                  <BarChart3 className="w-4 h-4" />
                  Plot departures
                </button>
              </form>

              {histogram && <HistogramChart layout={histogram.layout} />}
            </motion.div>
          )}
        </AnimatePresence>
      </main>
    </div>
  );
}
