import React from 'react';
import ReactDOM from 'react-dom/client';
import App from './App';
import './index.css';
import { createAppServices } from './services/appServices';

const rootElement = document.getElementById('root');
if (!rootElement) {
  throw new Error('Could not find root element to mount to');
}

const services = createAppServices();

const root = ReactDOM.createRoot(rootElement);
root.render(
  <React.StrictMode>
    <App services={services} />
  </React.StrictMode>
);
