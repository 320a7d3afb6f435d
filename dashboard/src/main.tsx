import React from "react";
import { createRoot } from "react-dom/client";
import { App } from "./App";
import { DEFAULT_API_BASE, createStoresApi } from "./api";

const container = document.getElementById("root");
if (!container) {
  throw new Error("dashboard root element #root is missing");
}

const api = createStoresApi(container.dataset.apiBase || DEFAULT_API_BASE);

createRoot(container).render(
  <React.StrictMode>
    <App api={api} />
  </React.StrictMode>
);
