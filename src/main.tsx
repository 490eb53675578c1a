import { StrictMode } from "react";
import { createRoot } from "react-dom/client";
import "./index.css";
import App from "./App";
import ErrorBoundary from "./components/ErrorBoundary";
import { createLogger } from "./lib/logger";

const log = createLogger("main");

const root = document.getElementById("root");
if (!root) throw new Error("Missing #root element");

log.info("Booting React root…");

createRoot(root).render(
  <StrictMode>
    <ErrorBoundary title="App crashed">
      <App />
    </ErrorBoundary>
  </StrictMode>
);
