import Link from 'next/link';
import { Crosshair } from 'lucide-react';
import { Button } from '@/components/ui/button';

const Header = () => {

  const headers = [
    { label: "Home", href: "/" },
    { label: "How it works", href: "/#how-it-works" },
    { label: "Dashboard", href: "/dashboard" },
  ]
  return (
    <header className="sticky top-0 z-50 flex flex-row justify-between items-center text-sm backdrop-blur-sm px-6 md:px-16 py-4">
      <Link href="/" className='flex gap-2 items-center font-bold text-lg'>
        <Crosshair className="w-6 h-6 text-purple-400" />
        <span>Differentiation Mapper</span>
      </Link>
      <nav className='hidden md:flex flex-row font-semibold border-2 border-white/10 px-6 py-3 rounded-full gap-6'>
        {headers.map((item) => (
          <Link key={item.href} href={item.href} className="text-gray-200 hover:scale-105 transition-transform duration-200">
            {item.label}
          </Link>
        ))}
      </nav>
      <div>
        <Button asChild className="bg-purple-600 hover:bg-purple-700 text-white font-bold rounded-full transition-all duration-300 shadow-lg hover:shadow-purple-500/50">
          <Link href="/dashboard">Analyze an idea</Link>
        </Button>
      </div>
    </header>
  );
};

export default Header
