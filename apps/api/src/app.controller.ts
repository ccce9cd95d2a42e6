import { Controller, Get } from "@nestjs/common";
import { AppService } from "./app.service";

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get("health")
  getHealth(): { status: string; message: string } {
    return {
      status: "ok",
      message: this.appService.getHello(),
    };
  }
}
