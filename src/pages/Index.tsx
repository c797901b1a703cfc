import NaiveSearchVisualizer from "@/components/dsa/visualizer/string-search/NaiveSearchVisualizer";

const Index = () => {
  return (
    <main className="container mx-auto max-w-6xl space-y-6 px-4 py-10">
      <div className="space-y-2">
        <h1 className="text-3xl font-bold tracking-tight">Naive String Search</h1>
        <p className="text-muted-foreground">
          Step through every character comparison of the brute-force search, one click at a time.
        </p>
      </div>
      <NaiveSearchVisualizer />
    </main>
  );
};

export default Index;
