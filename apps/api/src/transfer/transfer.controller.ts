import { Body, Controller, Post } from "@nestjs/common";
import { FilePathDto } from "./dto/file-path.dto";
import { TransferService } from "./transfer.service";

@Controller("transfer")
export class TransferController {
  constructor(private readonly transferService: TransferService) { }

  @Post("json/export")
  async exportJson(@Body() dto: FilePathDto) {
    return this.transferService.exportJson(dto.path);
  }

  @Post("csv/export")
  async exportCsv(@Body() dto: FilePathDto) {
    return this.transferService.exportCsv(dto.path);
  }

  @Post("json/import")
  async importJson(@Body() dto: FilePathDto) {
    return this.transferService.importJson(dto.path);
  }

  @Post("csv/import")
  async importCsv(@Body() dto: FilePathDto) {
    return this.transferService.importCsv(dto.path);
  }
}
