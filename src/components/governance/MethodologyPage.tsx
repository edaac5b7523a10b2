import { API526_ORIFICES } from '../../engine/modules/OrificeSizingModule';

export default function MethodologyPage({ onBack }: { onBack: () => void }) {
  return (
    <div className="governance-page">
      <div className="page-header">
        <button className="back-btn" onClick={onBack}>← Back</button>
        <span className="step-label">Methodology</span>
      </div>

      <div className="governance-content">
        <h1>Methodology</h1>

        <h2>1. Vessel geometry</h2>
        <ul>
          <li>Inner diameter is the outer diameter less twice the shell thickness</li>
          <li>F&amp;D heads use a crown radius of 1.0·Di and a knuckle radius of 0.06·Di</li>
          <li>Liquid height is found from the fill volume by bisection on the exact head volume</li>
          <li>Wetted area is counted up to the lower of the liquid level and the fire height limit</li>
        </ul>

        <h2>2. Fire heat load</h2>
        <ul>
          <li>API 2000: banded correlation on wetted area and design pressure, fire limit 9.14 m</li>
          <li>API 520: Q = 43 200·A^0.82 (prompt firefighting and drainage) or 70 900·A^0.82, fire limit 7.62 m</li>
          <li>Relief rate is the heat load divided by the latent heat</li>
        </ul>

        <h2>3. Relief conditions</h2>
        <ul>
          <li>P1 = MAWP × (1 + accumulation) + atmospheric pressure</li>
          <li>Critical flow when backpressure is below P1·(2/(k+1))^(k/(k−1))</li>
        </ul>

        <h2>4. Orifice sizing</h2>
        <ul>
          <li>Critical: A = W·√(T·Z/M) / (C·Kd·P1·Kb·Kc)</li>
          <li>Subcritical: A = W·√(T·Z/(M·P1·(P1 − P2))) / (735·F2·Kd·Ke)</li>
          <li>The smallest API 526 letter with area at or above the requirement is selected</li>
        </ul>

        <table className="result-table">
          <thead>
            <tr>
              <th>Letter</th>
              <th>Area (in²)</th>
              <th>Inlet (in)</th>
            </tr>
          </thead>
          <tbody>
            {API526_ORIFICES.map(o => (
              <tr key={o.letter}>
                <td>{o.letter}</td>
                <td>{o.areaIn2.toFixed(3)}</td>
                <td>{o.inletIn}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
}
