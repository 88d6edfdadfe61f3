import { useMemo } from 'react';
import Board from './components/Board';
import { parseDisplayConfig } from './config/displayConfig';

function App() {
  // Read once at startup
  const config = useMemo(() => parseDisplayConfig(window.location.search), []);
  return <Board config={config} />;
}

export default App;
