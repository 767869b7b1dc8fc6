import HomeView from "@/modules/home/ui/views/home-view";

export default function Page() {
  return <HomeView />;
}
