"use client";

import { useState, useEffect } from 'react';

interface SearchProgressLoaderProps {
  query: string;
}

interface ProgressStep {
  id: string;
  label: string;
  progress: number;
  isActive: boolean;
  isComplete: boolean;
}

const STEP_HINTS = [
  '🤖 Asking the language model what your query means...',
  '🏛️ Matching institution and collection names in GRSciColl...',
  '🌍 Searching preserved specimen records on GBIF...',
];

export function SearchProgressLoader({ query }: SearchProgressLoaderProps) {
  const [steps, setSteps] = useState<ProgressStep[]>([
    { id: 'translate', label: 'Interpreting query', progress: 0, isActive: true, isComplete: false },
    { id: 'resolve', label: 'Resolving institutions and collections', progress: 0, isActive: false, isComplete: false },
    { id: 'search', label: 'Searching GBIF', progress: 0, isActive: false, isComplete: false },
  ]);

  const [currentStepIndex, setCurrentStepIndex] = useState(0);

  useEffect(() => {
    const interval = setInterval(() => {
      setSteps(prevSteps =>
        prevSteps.map((step, index) => {
          if (index !== currentStepIndex || step.isComplete) return step;
          // Translation dominates; the last step never completes on its own
          const progress = Math.min(step.progress + Math.random() * 3 + 0.5, index === prevSteps.length - 1 ? 95 : 100);
          if (progress < 100) return { ...step, progress };
          return { ...step, progress: 100, isActive: false, isComplete: true };
        }),
      );
    }, 150);

    return () => clearInterval(interval);
  }, [currentStepIndex]);

  useEffect(() => {
    const current = steps[currentStepIndex];
    if (current?.isComplete && currentStepIndex < steps.length - 1) {
      setSteps(prevSteps =>
        prevSteps.map((step, index) => (index === currentStepIndex + 1 ? { ...step, isActive: true } : step)),
      );
      setCurrentStepIndex(currentStepIndex + 1);
    }
  }, [steps, currentStepIndex]);

  return (
    <div className="w-full max-w-lg mx-auto p-6 bg-white/80 backdrop-blur-sm rounded-xl border border-green-200 shadow-lg">
      <div className="text-center mb-6">
        <div className="text-3xl mb-2">🔎</div>
        <h3 className="text-lg font-semibold text-green-800">Processing query</h3>
        <p className="text-sm text-green-600">&ldquo;{query}&rdquo;</p>
      </div>

      <div className="space-y-4">
        {steps.map((step, index) => (
          <div key={step.id} className="space-y-2">
            <div className="flex items-center justify-between">
              <div className="flex items-center space-x-3">
                <div className={`w-6 h-6 rounded-full flex items-center justify-center text-xs font-bold ${
                  step.isComplete
                    ? 'bg-green-500 text-white'
                    : step.isActive
                      ? 'bg-orange-500 text-white animate-pulse'
                      : 'bg-gray-200 text-gray-500'
                }`}>
                  {step.isComplete ? '✓' : index + 1}
                </div>
                <span className={`text-sm font-medium ${
                  step.isActive ? 'text-orange-700' : step.isComplete ? 'text-green-700' : 'text-gray-500'
                }`}>
                  {step.label}
                </span>
              </div>
            </div>

            <div className="w-full bg-gray-200 rounded-full h-2">
              <div
                className={`h-2 rounded-full transition-all duration-300 ease-out ${
                  step.isComplete ? 'bg-green-500' : step.isActive ? 'bg-orange-500' : 'bg-gray-300'
                }`}
                style={{ width: `${step.progress}%` }}
              />
            </div>
          </div>
        ))}
      </div>

      <div className="mt-6 text-center text-sm text-orange-600 animate-pulse">
        {STEP_HINTS[currentStepIndex]}
      </div>
    </div>
  );
}
