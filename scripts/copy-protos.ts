#!/usr/bin/env tsx
/**
 * Copy .proto files next to the compiled gRPC modules, which load them at run time
 */
import fs from 'fs';
import path from 'path';

const SOURCE_DIR = path.join(process.cwd(), 'src/grpc/protos');
const TARGET_DIR = path.join(process.cwd(), 'dist/grpc/protos');

fs.mkdirSync(TARGET_DIR, { recursive: true });

const protos = fs.readdirSync(SOURCE_DIR).filter((file) => file.endsWith('.proto'));
for (const file of protos) {
  fs.copyFileSync(path.join(SOURCE_DIR, file), path.join(TARGET_DIR, file));
}

console.log(`Copied ${protos.length} proto file(s) to ${path.relative(process.cwd(), TARGET_DIR)}`);
