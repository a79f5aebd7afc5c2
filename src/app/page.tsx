import Link from "next/link";

export default function Home() {
  return (
    <main className="min-h-screen flex flex-col items-center justify-center gap-6 p-6 text-center">
      <h1 className="text-4xl font-bold">Material Indent</h1>
      <p className="text-lg max-w-xl">Request stores items for your department and look up past indents.</p>
      <div className="flex flex-wrap justify-center gap-6">
        <Link href="/indent/new" className="px-6 py-3 rounded-lg font-semibold bg-black text-white">
          New indent
        </Link>
        <Link href="/indent/history" className="px-6 py-3 rounded-lg font-semibold bg-black text-white">
          History
        </Link>
      </div>
    </main>
  );
}
