import type { SizingResultV1 } from '../engine/schema/SizingInputV1';
import type { SizingFlag } from '../contracts/SizingOutputV1';

export interface ResultRow {
  label: string;
  value: string;
}

const SEVERITY_CLASS: Record<SizingFlag['severity'], string> = {
  info: 'flag flag--info',
  warn: 'flag flag--warn',
  fail: 'flag flag--fail',
};

/** Display rows in calculation order. Formatting only; every value comes from the engine. */
export function buildResultRows(result: SizingResultV1): ResultRow[] {
  const { exposure } = result;
  return [
    { label: 'Fire method', value: `${result.method} (fire height limit ${result.fireHeightLimitM.toFixed(2)} m)` },
    { label: 'Liquid height', value: `${exposure.liquidHeightM.toFixed(3)} m` },
    { label: 'Exposed height', value: `${exposure.exposedHeightM.toFixed(3)} m` },
    { label: 'Wetted area', value: `${exposure.wettedAreaM2.toFixed(2)} m²` },
    { label: 'Heat load', value: `${(result.heatLoadW / 1000).toFixed(1)} kW` },
    { label: 'Relief rate', value: `${result.evaporationRateKgH.toFixed(1)} kg/h (${result.massFlowLbH.toFixed(1)} lb/h)` },
    { label: 'Relieving pressure P1', value: `${result.relievingPressurePsia.toFixed(2)} psia` },
    { label: 'Flow regime', value: result.flowRegime === 'critical' ? 'Critical' : 'Subcritical' },
    { label: 'Required area', value: `${result.requiredAreaIn2.toFixed(4)} in²` },
    {
      label: 'Selected orifice',
      value: result.orifice
        ? `${result.orifice.letter} (${result.orifice.areaIn2.toFixed(3)} in²)`
        : 'None (exceeds the largest standard orifice)',
    },
    { label: 'Minimum inlet', value: `${result.minimumInletIn.toFixed(1)} in` },
  ];
}

export default function SizingResultPanel({ result }: { result: SizingResultV1 }) {
  return (
    <section className="result-panel">
      <h2>Sizing result</h2>
      <table className="result-table">
        <tbody>
          {buildResultRows(result).map(row => (
            <tr key={row.label}>
              <th scope="row">{row.label}</th>
              <td>{row.value}</td>
            </tr>
          ))}
        </tbody>
      </table>

      {result.flags.length > 0 && (
        <ul className="flag-list">
          {result.flags.map(flag => (
            <li key={flag.id} className={SEVERITY_CLASS[flag.severity]}>
              <strong>{flag.title}</strong>
              <p>{flag.detail}</p>
              {flag.action && <p className="flag-action">{flag.action}</p>}
            </li>
          ))}
        </ul>
      )}

      <ul className="note-list">
        {result.notes.map(note => <li key={note}>{note}</li>)}
      </ul>

      <p className="result-meta">
        Engine v{result.meta.engineVersion} · {result.meta.contractVersion}
      </p>
    </section>
  );
}
