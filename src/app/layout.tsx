import "./globals.css";
import Providers from "./providers";

export const metadata = {
  title: "GME",
  description: "Projects and processing runs of the GME services",
};

/**
 * Root layout. Wraps the application in Providers and defines the
 * html/body structure.
 */
export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body className="min-h-screen bg-gray-50 antialiased">
        <Providers>{children}</Providers>
      </body>
    </html>
  );
}
