/* ------------------------------------------------------------------ */
/*  SPA entry — mounted by index.html, served under /dashboard/        */
/* ------------------------------------------------------------------ */

import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { DashboardProvider } from './store/index.js';
import { DashboardLayout } from './dashboard/layout/DashboardLayout.js';

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');

createRoot(container).render(
  <StrictMode>
    <DashboardProvider>
      <DashboardLayout />
    </DashboardProvider>
  </StrictMode>,
);
