"use client";

import Link from "next/link";
import { ThemeToggle } from "@/components/ThemeToggle";

function Navbar() {
  // Consistent hover style for links and button
  const linkHoverStyle = "hover:text-accent-foreground transition-colors duration-200";

  return (
    <nav
      className="flex items-center justify-between p-4 border-b min-w-full text-navbar-foreground"
      style={{ backgroundColor: 'var(--navbar-background)' }}
    >
      <Link href="/" className={`text-xl font-semibold ${linkHoverStyle}`}>
        Kinetic Order Finder
      </Link>

      <span className="hidden md:inline text-xl font-semibold">Rate Constant from Concentration Data</span>

      <div className={linkHoverStyle}>
        <ThemeToggle />
      </div>
    </nav>
  );
}

export default Navbar;
