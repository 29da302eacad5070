import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import { tokenFromSearch } from './api/client';
import './styles.css';

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');

createRoot(container).render(
  <StrictMode>
    <App token={tokenFromSearch(window.location.search)} />
  </StrictMode>
);
