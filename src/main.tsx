import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import ChargeSimulationWorkspace from './scripts/ChargeSimulationWorkspace'

const rootElement = document.getElementById('root') || (() => {
  const div = document.createElement('div');
  div.id = 'root';
  document.body.appendChild(div);
  return div;
})();

createRoot(rootElement).render(
  <StrictMode>
    <ChargeSimulationWorkspace />
  </StrictMode>,
)
