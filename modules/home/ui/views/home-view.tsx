import { Button } from '@/components/ui/button';
import { Card, CardContent } from '@/components/ui/card';
import { ChevronRight, Grid3x3, Lightbulb, Radar, Search } from 'lucide-react';
import Link from 'next/link';
import Header from '../components/header';

const HomeView = () => {
  const steps = [
    { title: "Competitor Discovery", desc: "A web search on your idea, read by an AI analyst that names the real players and what they offer.", icon: Search },
    { title: "Feature Matrix", desc: "The features that matter in your space, and which competitor offers each one.", icon: Grid3x3 },
    { title: "Differentiation Strategy", desc: "Gaps, opportunities and a positioning narrative grounded in the matrix.", icon: Lightbulb },
    { title: "Gap Map", desc: "A chart of feature coverage across competitors, exportable as JSON.", icon: Radar },
  ]

  return (
    <>
      <Header />
      <div className="flex flex-col items-center justify-center min-h-screen">
        <main className="flex-1 justify-center">
          <section className="w-full py-12 md:py-24">
            <div className="container px-4 md:px-6 mx-auto">
              <div className="flex flex-col justify-center space-y-4 max-w-3xl">
                <div className="space-y-6 py-4">
                  <h1 className="flex flex-col py-2 gap-4 text-4xl md:text-5xl lg:text-[3.5rem] font-bold tracking-tighter bg-clip-text text-transparent bg-linear-to-r from-purple-400 to-pink-600">
                    <span>Find the gap</span>
                    <span>your startup can own</span>
                  </h1>
                  <p className="max-w-[600px] text-gray-400 md:text-xl">
                    Describe your idea once. Four agents discover your competitors, compare their features and suggest where you can stand apart.
                  </p>
                </div>
                <div className="flex flex-col gap-2 min-[400px]:flex-row">
                  <Button asChild size="lg" className="w-full min-[400px]:w-auto bg-purple-600 hover:bg-purple-700 text-white font-bold py-3 px-6 rounded-full transition-all duration-300 shadow-lg hover:shadow-purple-500/50">
                    <Link href="/dashboard">
                      Get Started <ChevronRight size="20" />
                    </Link>
                  </Button>
                </div>
              </div>
            </div>
          </section>
          <section id="how-it-works" className="max-w-6xl w-full mx-auto py-10 px-4 sm:px-6 lg:px-8">
            <h2 className="text-2xl font-bold tracking-tighter sm:text-4xl text-center mb-10 bg-clip-text text-transparent bg-linear-to-r from-purple-400 to-pink-600">
              How it works
            </h2>
            <div className="mx-auto grid items-center gap-6 md:grid-cols-2 lg:grid-cols-4">
              {steps.map((step) => (
                <Card key={step.title} className="rounded-lg border-none transition-all duration-300 hover:scale-103 hover:shadow-purple-500/30">
                  <CardContent className="h-56 flex flex-col items-center justify-center gap-4">
                    <step.icon className="h-10 w-10 text-purple-400" />
                    <h3 className="text-lg font-bold text-center">{step.title}</h3>
                    <p className="text-center text-sm text-gray-400">{step.desc}</p>
                  </CardContent>
                </Card>
              ))}
            </div>
          </section>
        </main>
      </div>
    </>
  );
};

export default HomeView;
