import { Module } from "@nestjs/common";
import { ARTIFACT_WRITER } from "./artifact-writer.interface";
import { CsvArtifactWriter } from "./csv-artifact.writer";

@Module({
  providers: [
    CsvArtifactWriter,
    {
      provide: ARTIFACT_WRITER,
      useExisting: CsvArtifactWriter,
    },
  ],
  exports: [ARTIFACT_WRITER],
})
export class OutputModule {}
