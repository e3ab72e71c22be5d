'use client';

import { useMemo, useState } from 'react';
import { useTheme } from 'next-themes';

// Import ECharts components
import ReactECharts from 'echarts-for-react';
import * as echarts from 'echarts/core';
import { LineChart, ScatterChart } from 'echarts/charts';
import {
  TitleComponent,
  TooltipComponent,
  GridComponent,
  LegendComponent,
} from 'echarts/components';
import { CanvasRenderer } from 'echarts/renderers';

import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card";
import { Alert, AlertDescription, AlertTitle } from "@/components/ui/alert";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Label } from "@/components/ui/label";
import { Textarea } from "@/components/ui/textarea";
import { Tabs, TabsContent, TabsList, TabsTrigger } from "@/components/ui/tabs";

import { parseFiniteNumber, parseKineticsText } from '@/lib/kinetics-data';
import { describeVerdict, evaluateKinetics, formatKineticsNumber } from '@/lib/kinetics-fit';
import { twoPointRateConstant } from '@/lib/integrated-rate-laws';
import { buildLinearizedPlotOptions, buildProfilePlotOptions } from '@/lib/kinetics-chart';
import { DELIMITER_OPTIONS, EXAMPLE_DATA, KINETICS_DEFAULTS, ORDER_MODELS, REACTION_ORDERS } from '@/lib/kinetics-constants';
import { InsufficientDataError, KineticsError } from '@/lib/kinetics-errors';
import type { Delimiter, KineticsEvaluation, ReactionOrder, SampleSet } from '@/lib/kinetics-types';

echarts.use([
  TitleComponent,
  TooltipComponent,
  GridComponent,
  LegendComponent,
  LineChart,
  ScatterChart,
  CanvasRenderer
]);

type Analysis =
  | { status: 'ok'; samples: SampleSet; evaluation: KineticsEvaluation }
  | { status: 'warning'; message: string }
  | { status: 'error'; message: string };

function analyze(text: string, delimiter: Delimiter): Analysis {
  try {
    const samples = parseKineticsText(text, delimiter);
    return { status: 'ok', samples, evaluation: evaluateKinetics(samples) };
  } catch (error) {
    if (error instanceof InsufficientDataError) {
      return { status: 'warning', message: error.message };
    }
    if (error instanceof KineticsError) {
      console.error("Kinetics data rejected:", error);
      return { status: 'error', message: error.message };
    }
    throw error;
  }
}

export default function KineticOrderPage() {
  const { resolvedTheme } = useTheme();

  // Data input
  const [dataText, setDataText] = useState<string>(EXAMPLE_DATA);
  const [delimiter, setDelimiter] = useState<Delimiter>(KINETICS_DEFAULTS.delimiter);

  // Two-point calculator
  const [twoPointOrder, setTwoPointOrder] = useState<ReactionOrder>('first');
  const [a0Input, setA0Input] = useState<string>('1.0');
  const [atInput, setAtInput] = useState<string>('0.5');
  const [tInput, setTInput] = useState<string>('10');
  const [twoPointResult, setTwoPointResult] = useState<string | null>(null);
  const [twoPointError, setTwoPointError] = useState<string | null>(null);

  // Recomputed in full on every edit; nothing carries over between inputs
  const analysis = useMemo(() => analyze(dataText, delimiter), [dataText, delimiter]);

  const chartOptions = useMemo(() => {
    if (analysis.status !== 'ok') return null;
    const { samples, evaluation } = analysis;
    return {
      zeroth: buildLinearizedPlotOptions(evaluation.zeroth, samples, resolvedTheme),
      first: buildLinearizedPlotOptions(evaluation.first, samples, resolvedTheme),
      second: buildLinearizedPlotOptions(evaluation.second, samples, resolvedTheme),
      profile: buildProfilePlotOptions(evaluation, samples, resolvedTheme),
    };
  }, [analysis, resolvedTheme]);

  const calculateTwoPoint = () => {
    setTwoPointResult(null);
    setTwoPointError(null);
    const a0 = parseFiniteNumber(a0Input);
    const at = parseFiniteNumber(atInput);
    const t = parseFiniteNumber(tInput);
    if (a0 === null || at === null || t === null) {
      setTwoPointError("All three fields must be numbers.");
      return;
    }
    try {
      const k = twoPointRateConstant(twoPointOrder, a0, at, t);
      setTwoPointResult(`k = ${formatKineticsNumber(k, KINETICS_DEFAULTS.rateConstantDigits)} ${ORDER_MODELS[twoPointOrder].units}`);
    } catch (error) {
      if (!(error instanceof KineticsError)) throw error;
      setTwoPointError(error.message);
    }
  };

  return (
    <div className="container mx-auto p-4 md:p-8 px-8 md:px-16">
      <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">

        {/* Column 1: Inputs */}
        <div className="lg:col-span-1 space-y-6">
          <Card>
            <CardHeader>
              <CardTitle>Concentration Data</CardTitle>
              <CardDescription>Paste two columns: time (s) and concentration (M).</CardDescription>
            </CardHeader>
            <CardContent className="space-y-4">
              <div className="space-y-2">
                <Label>Delimiter</Label>
                <div className="flex gap-2">
                  {DELIMITER_OPTIONS.map(option => (
                    <Button
                      key={option.value}
                      variant={delimiter === option.value ? 'default' : 'outline'}
                      size="sm"
                      onClick={() => setDelimiter(option.value)}
                      className="flex-1"
                    >
                      {option.label}
                    </Button>
                  ))}
                </div>
              </div>
              <div className="space-y-2">
                <Label htmlFor="kinetics-data">Data</Label>
                <Textarea
                  id="kinetics-data"
                  value={dataText}
                  onChange={(e) => setDataText(e.target.value)}
                  rows={12}
                  spellCheck={false}
                />
              </div>
              <div className="flex gap-2">
                <Button variant="outline" onClick={() => setDataText(EXAMPLE_DATA)} className="flex-1">Load Example</Button>
                <Button variant="outline" onClick={() => setDataText('')} className="flex-1">Clear</Button>
              </div>
            </CardContent>
          </Card>

          <Card>
            <CardHeader>
              <CardTitle>Two-Point Rate Constant</CardTitle>
              <CardDescription>k from an initial and a final concentration.</CardDescription>
            </CardHeader>
            <CardContent className="space-y-4">
              <div className="flex gap-2">
                {REACTION_ORDERS.map(order => (
                  <Button
                    key={order}
                    variant={twoPointOrder === order ? 'default' : 'outline'}
                    size="sm"
                    onClick={() => { setTwoPointOrder(order); setTwoPointResult(null); setTwoPointError(null); }}
                    className="flex-1"
                  >
                    {ORDER_MODELS[order].name}
                  </Button>
                ))}
              </div>
              <div className="grid grid-cols-3 gap-2">
                <div className="space-y-2">
                  <Label htmlFor="a0-input">[A]₀ (M)</Label>
                  <Input id="a0-input" type="number" value={a0Input} onChange={(e) => setA0Input(e.target.value)} />
                </div>
                <div className="space-y-2">
                  <Label htmlFor="at-input">[A]ₜ (M)</Label>
                  <Input id="at-input" type="number" value={atInput} onChange={(e) => setAtInput(e.target.value)} />
                </div>
                <div className="space-y-2">
                  <Label htmlFor="t-input">t (s)</Label>
                  <Input id="t-input" type="number" value={tInput} onChange={(e) => setTInput(e.target.value)} />
                </div>
              </div>
              <Button onClick={calculateTwoPoint} className="w-full">Calculate k</Button>
              {twoPointResult && <p className="text-sm font-medium">{twoPointResult}</p>}
              {twoPointError && <p className="text-sm text-red-500">{twoPointError}</p>}
            </CardContent>
          </Card>
        </div>

        {/* Column 2: Results */}
        <div className="lg:col-span-2 space-y-6">
          {analysis.status === 'error' && (
            <Alert variant="destructive">
              <AlertTitle>Could not read the data</AlertTitle>
              <AlertDescription>{analysis.message}</AlertDescription>
            </Alert>
          )}
          {analysis.status === 'warning' && (
            <Alert>
              <AlertTitle>Not enough data</AlertTitle>
              <AlertDescription>{analysis.message}</AlertDescription>
            </Alert>
          )}

          {analysis.status === 'ok' && chartOptions && (
            <>
              <Alert>
                <AlertTitle>Verdict</AlertTitle>
                <AlertDescription>{describeVerdict(analysis.evaluation)}</AlertDescription>
              </Alert>

              <Card>
                <CardHeader><CardTitle>Model Comparison</CardTitle></CardHeader>
                <CardContent>
                  <table className="w-full text-sm">
                    <thead>
                      <tr className="border-b text-left">
                        <th className="py-2">Order</th>
                        <th className="py-2">Integrated equation</th>
                        <th className="py-2">k</th>
                        <th className="py-2">R²</th>
                        <th className="py-2">Points</th>
                      </tr>
                    </thead>
                    <tbody>
                      {REACTION_ORDERS.map(order => {
                        const fit = analysis.evaluation[order];
                        const isBest = order === analysis.evaluation.best;
                        return (
                          <tr key={order} className={`border-b last:border-b-0 ${isBest ? 'font-semibold' : ''}`}>
                            <td className="py-2">{ORDER_MODELS[order].name}</td>
                            <td className="py-2 font-mono">{fit.equation}</td>
                            <td className="py-2">
                              {fit.degenerate ? '—' : `${formatKineticsNumber(fit.rateConstant, KINETICS_DEFAULTS.rateConstantDigits)} ${fit.units}`}
                            </td>
                            <td className="py-2">{fit.rSquared.toFixed(KINETICS_DEFAULTS.displayDigits)}</td>
                            <td className="py-2">
                              {fit.sampleCount}{fit.excludedCount > 0 ? ` (${fit.excludedCount} excluded)` : ''}
                            </td>
                          </tr>
                        );
                      })}
                    </tbody>
                  </table>
                </CardContent>
              </Card>

              <Card>
                <CardContent>
                  <Tabs key={analysis.evaluation.best} defaultValue={analysis.evaluation.best}>
                    <TabsList>
                      {REACTION_ORDERS.map(order => (
                        <TabsTrigger key={order} value={order}>{ORDER_MODELS[order].linearLabel} vs t</TabsTrigger>
                      ))}
                      <TabsTrigger value="profile">[A] vs t</TabsTrigger>
                    </TabsList>
                    {REACTION_ORDERS.map(order => (
                      <TabsContent key={order} value={order}>
                        <div className="relative h-[450px] rounded-md">
                          <ReactECharts echarts={echarts} option={chartOptions[order]} style={{ height: '100%', width: '100%' }} notMerge={true} lazyUpdate={true} />
                        </div>
                      </TabsContent>
                    ))}
                    <TabsContent value="profile">
                      <div className="relative h-[450px] rounded-md">
                        <ReactECharts echarts={echarts} option={chartOptions.profile} style={{ height: '100%', width: '100%' }} notMerge={true} lazyUpdate={true} />
                      </div>
                    </TabsContent>
                  </Tabs>
                </CardContent>
              </Card>
            </>
          )}
        </div>

      </div>
    </div>
  );
}
