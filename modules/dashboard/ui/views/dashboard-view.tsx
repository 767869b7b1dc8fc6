'use client';

import { useState } from 'react';
import { AlertTriangle, BarChart3, Building2, Download, Lightbulb, Loader2 } from 'lucide-react';
import { Button } from '@/components/ui/button';
import {
  Card,
  CardContent,
  CardDescription,
  CardHeader,
  CardTitle,
} from '@/components/ui/card';
import { Tabs, TabsContent, TabsList, TabsTrigger } from '@/components/ui/tabs';
import { Textarea } from '@/components/ui/textarea';
import { useAnalysis } from '../../hooks/use-analysis';
import { downloadBundle } from '../../lib/download';
import AnalysisProgress from '../components/analysis-progress';
import CompetitorsPanel from '../components/competitors-panel';
import FeatureMapPanel from '../components/feature-map-panel';
import IssuesNotice from '../components/issues-notice';
import LandscapeTable from '../components/landscape-table';
import StrategyPanel from '../components/strategy-panel';

export default function DashboardView({ configError }: { configError: string | null }) {
  const [idea, setIdea] = useState('');
  const { bundle, steps, loading, error, analyze } = useAnalysis();

  const runPipeline = () => {
    if (!idea.trim()) return;
    void analyze(idea);
  };

  return (
    <div className="flex-1 p-6 sm:px-10 sm:py-6 text-white space-y-6 max-w-6xl mx-auto">
      <Card>
        <CardHeader>
          <CardTitle className="text-3xl font-bold text-purple-300">
            Analyze Your Startup Idea
          </CardTitle>
          <CardDescription>
            Describe the problem you solve and who it is for. The agents will find competitors,
            compare features and suggest how to differentiate.
          </CardDescription>
        </CardHeader>
        <CardContent className="space-y-4">
          {configError && (
            <div role="alert" className="flex gap-2 items-start rounded-lg border border-red-500/30 bg-red-500/10 p-3 text-sm text-red-200">
              <AlertTriangle className="w-4 h-4 mt-0.5 flex-shrink-0" />
              <span>{configError}</span>
            </div>
          )}
          <Textarea
            placeholder="e.g. A subscription box for artisanal coffee..."
            value={idea}
            onChange={(e) => setIdea(e.target.value)}
            disabled={loading}
          />
          <div className="flex flex-wrap items-center gap-3">
            <Button
              onClick={runPipeline}
              disabled={loading || !idea.trim() || configError !== null}
              className="px-6"
            >
              {loading && <Loader2 className="animate-spin w-4 h-4" />}
              Analyze
            </Button>
            {bundle && (
              <Button variant="outline" onClick={() => downloadBundle(bundle)}>
                <Download className="w-4 h-4" /> Download JSON
              </Button>
            )}
          </div>
          {(loading || bundle) && <AnalysisProgress steps={steps} />}
          {error && (
            <p role="alert" className="text-sm text-red-300">{error}</p>
          )}
        </CardContent>
      </Card>

      {bundle && (
        <Card>
          <CardHeader>
            <CardTitle className="text-2xl font-extrabold tracking-tight bg-gradient-to-r from-purple-400 to-pink-300 bg-clip-text text-transparent">
              {bundle.query}
            </CardTitle>
            <CardDescription>
              Generated on: {new Date(bundle.generatedAt).toLocaleString()}
            </CardDescription>
          </CardHeader>
          <CardContent className="space-y-6">
            <IssuesNotice issues={bundle.issues} />
            <Tabs defaultValue="competitors">
              <TabsList>
                <TabsTrigger value="competitors">
                  <Building2 className="w-4 h-4" /> Competitors ({bundle.competitors.length})
                </TabsTrigger>
                <TabsTrigger value="strategy">
                  <Lightbulb className="w-4 h-4" /> Differentiation Strategy
                </TabsTrigger>
                <TabsTrigger value="feature-map">
                  <BarChart3 className="w-4 h-4" /> Feature Map
                </TabsTrigger>
              </TabsList>
              <TabsContent value="competitors" className="space-y-6">
                <LandscapeTable landscape={bundle.landscape} />
                <CompetitorsPanel competitors={bundle.competitors} />
              </TabsContent>
              <TabsContent value="strategy">
                <StrategyPanel report={bundle.report} />
              </TabsContent>
              <TabsContent value="feature-map">
                <FeatureMapPanel chart={bundle.chart} matrix={bundle.featureMatrix} />
              </TabsContent>
            </Tabs>
          </CardContent>
        </Card>
      )}
    </div>
  );
}
