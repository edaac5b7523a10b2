export default function ScopePage({ onBack }: { onBack: () => void }) {
  return (
    <div className="governance-page">
      <div className="page-header">
        <button className="back-btn" onClick={onBack}>← Back</button>
        <span className="step-label">Scope Statement</span>
      </div>

      <div className="governance-content">
        <h1>Scope Statement</h1>

        <p className="governance-lead">
          This tool sizes a single pressure relief valve for the external pool-fire case on a
          vertical vessel holding a boiling liquid.
        </p>

        <h2>It covers</h2>
        <ul>
          <li>Vertical cylindrical vessels with torispherical, 2:1 ellipsoidal or hemispherical heads</li>
          <li>Fire heat input per API 2000 (MAWP ≤ 15 psig) or API 520 / 521 (MAWP &gt; 15 psig)</li>
          <li>Vapour relief in critical or subcritical flow</li>
          <li>Selection from the standard API 526 orifice letters D to T</li>
        </ul>

        <h2>It does not cover</h2>
        <ul>
          <li>Horizontal or spherical vessels</li>
          <li>Two-phase or liquid relief</li>
          <li>Blocked outlet, thermal expansion or other relief cases</li>
          <li>Inlet pressure loss or outlet line sizing</li>
          <li>Multiple-valve or rupture-disc arrangements</li>
        </ul>

        <div className="governance-disclaimer">
          Results are screening estimates built from the supplied inputs. Final relief device
          selection and certification remain the responsibility of the responsible engineer.
        </div>
      </div>
    </div>
  );
}
