import React from 'react';
import { createRoot } from 'react-dom/client';
import { createBrowserRouter, RouterProvider } from 'react-router-dom';
import App from './App';
const Dashboard = React.lazy(() => import('@/pages/Dashboard'));
const NotFound = React.lazy(() => import('@/pages/NotFound'));
import { DataProvider } from '@/context/DataContext';
import './styles/global.css';

const router = createBrowserRouter([
  {
    path: '/',
    element: <App />,
    children: [
      { index: true, element: <Dashboard /> },
      { path: '*', element: <NotFound /> }
    ]
  }
]);

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');

createRoot(container).render(
  <React.StrictMode>
    <DataProvider>
      <React.Suspense fallback={<div style={{ padding: 16 }}>Loading…</div>}>
        <RouterProvider router={router} />
      </React.Suspense>
    </DataProvider>
  </React.StrictMode>
);
