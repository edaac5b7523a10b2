import { useState } from 'react';
import SizingForm from './components/SizingForm';
import SizingResultPanel from './components/SizingResultPanel';
import VesselSketch from './components/visualizers/VesselSketch';
import Footer from './components/Footer';
import ScopePage from './components/governance/ScopePage';
import MethodologyPage from './components/governance/MethodologyPage';
import { normalizeInput } from './engine/normalizer/Normalizer';
import { runSizingEngine } from './engine/Engine';
import { SizingError } from './engine/errors';
import type { SizingInputV1, SizingResultV1 } from './engine/schema/SizingInputV1';
import { DEFAULT_FORM_VALUES, toRawSnapshot } from './ui/sizingForm/SizingFormModel';
import type { SizingFormValues } from './ui/sizingForm/SizingFormModel';
import { sizingErrorLines } from './ui/errorReport/errorReport';
import type { ErrorLine } from './ui/errorReport/errorReport';
import './App.css';

type Page = 'sizing' | 'scope' | 'methodology';

interface SizingRun {
  input: SizingInputV1;
  result: SizingResultV1;
}

export default function App() {
  const [page, setPage] = useState<Page>('sizing');
  const [values, setValues] = useState<SizingFormValues>(DEFAULT_FORM_VALUES);
  const [run, setRun] = useState<SizingRun | null>(null);
  const [errorLines, setErrorLines] = useState<ErrorLine[]>([]);
  const [fatal, setFatal] = useState<{ error: unknown } | null>(null);

  // Boundaries only catch errors thrown while rendering.
  if (fatal) throw fatal.error;

  function handleSubmit() {
    try {
      const input = normalizeInput(toRawSnapshot(values));
      setRun({ input, result: runSizingEngine(input) });
      setErrorLines([]);
    } catch (err) {
      if (!(err instanceof SizingError)) {
        setFatal({ error: err });
        return;
      }
      setRun(null);
      setErrorLines(sizingErrorLines(err));
    }
  }

  if (page === 'scope') return <ScopePage onBack={() => setPage('sizing')} />;
  if (page === 'methodology') return <MethodologyPage onBack={() => setPage('sizing')} />;

  return (
    <div className="sizing-page">
      <div className="hero">
        <h1>🔥 Fire-Case Relief Sizing</h1>
        <p className="subtitle">API 2000 / API 520 — vertical vessels</p>
        <p className="tagline">
          Wetted area, fire heat load, relief rate and the API 526 orifice for a
          liquid-filled vessel exposed to a pool fire.
        </p>
      </div>

      <div className="sizing-layout">
        <SizingForm values={values} onChange={setValues} onSubmit={handleSubmit} />

        <div className="sizing-output">
          {errorLines.length > 0 && (
            <div className="error-panel" role="alert">
              <strong>Cannot size this case</strong>
              <ul>
                {errorLines.map(line => <li key={line.key}>{line.text}</li>)}
              </ul>
            </div>
          )}
          {run && (
            <>
              <SizingResultPanel result={run.result} />
              <div className="sketch-container">
                <VesselSketch geometry={run.input.geometry} exposure={run.result.exposure} />
              </div>
            </>
          )}
        </div>
      </div>

      <Footer onNavigate={setPage} />
    </div>
  );
}
