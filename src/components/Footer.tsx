import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';

export type GovernancePage = 'scope' | 'methodology';

export default function Footer({ onNavigate }: { onNavigate: (page: GovernancePage) => void }) {
  return (
    <footer className="site-footer">
      <nav className="footer-links">
        <button className="footer-link" onClick={() => onNavigate('scope')}>Scope</button>
        <button className="footer-link" onClick={() => onNavigate('methodology')}>Methodology</button>
      </nav>
      <p className="footer-meta">
        Engine v{ENGINE_VERSION} &nbsp;·&nbsp; {CONTRACT_VERSION}
      </p>
    </footer>
  );
}
