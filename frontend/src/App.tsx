import type { AppConfig } from "./lib/config";
import { CalculatorPage } from "./pages/CalculatorPage";

interface AppProps {
  config: AppConfig;
}

export default function App({ config }: AppProps) {
  return (
    <div className="min-h-screen bg-white text-slate-900">
      <div className="mx-auto max-w-6xl px-6 py-8">
        <nav className="flex items-center justify-between">
          <div>
            <p className="text-lg font-semibold tracking-tight">Childcare Calculator</p>
            <p className="text-xs text-slate-500">
              Estimate the total cost of child care in your area from regional averages, care duration and cost brackets.
            </p>
          </div>
        </nav>

        <CalculatorPage config={config} />
      </div>
    </div>
  );
}
